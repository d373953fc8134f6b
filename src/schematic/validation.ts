import type { ValidationIssue } from "@sch/errors";
import { pointKey } from "@sch/kicad/Geometry";
import { type Component, isValidReference } from "./Component";
import type { SchematicItem } from "./SchematicItem";
import type { Wire } from "./Wire";

export interface ValidationInput {
  rootPath: string;
  components: readonly Component[];
  wires: readonly Wire[];
  /** Every entity, for identifier checks. */
  items: readonly SchematicItem[];
  /** Extra identifiers owned by sub-entities (pins). */
  nestedIds: readonly string[];
  hasSymbol: (libId: string) => boolean;
}

/**
 * Structural checks over a whole document. Never throws for document defects;
 * each one becomes an issue.
 */
export function validateSchematic(input: ValidationInput): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  const seenIds = new Map<string, number>();
  for (const item of input.items) {
    if (!item.uuid) {
      issues.push({ code: "MISSING_ID", severity: "error", message: `A ${item.kind} has no identifier` });
      continue;
    }
    seenIds.set(item.uuid, (seenIds.get(item.uuid) ?? 0) + 1);
  }
  for (const id of input.nestedIds) seenIds.set(id, (seenIds.get(id) ?? 0) + 1);
  for (const [uuid, count] of seenIds) {
    if (count > 1) {
      issues.push({ code: "DUPLICATE_ID", severity: "error", message: `Identifier ${uuid} is used ${count} times`, uuid });
    }
  }

  const byScope = new Map<string, Component>();
  const byPosition = new Map<string, Component>();
  const symbolKnown = new Map<string, boolean>();

  for (const component of input.components) {
    const { uuid, reference } = component;

    if (!isValidReference(reference)) {
      issues.push({
        code: "INVALID_REFERENCE",
        severity: "error",
        message: `Reference "${reference}" does not match the expected format`,
        uuid,
        reference,
      });
    }

    for (const scope of component.referenceScopes(input.rootPath)) {
      if (!scope.reference) continue;
      const key = `${scope.path}\u0000${scope.reference}`;
      const first = byScope.get(key);
      if (first) {
        issues.push({
          code: "DUPLICATE_REFERENCE",
          severity: "error",
          message: `Reference ${scope.reference} is used by ${first.uuid} and ${uuid} in ${scope.path}`,
          uuid,
          reference: scope.reference,
        });
      } else {
        byScope.set(key, component);
      }
    }

    let known = symbolKnown.get(component.libId);
    if (known === undefined) {
      known = input.hasSymbol(component.libId);
      symbolKnown.set(component.libId, known);
    }
    if (!known) {
      issues.push({
        code: "MISSING_SYMBOL",
        severity: "error",
        message: `Symbol ${component.libId} used by ${reference} cannot be resolved`,
        uuid,
        reference,
      });
    }

    const rotation = component.rotation;
    if (rotation % 90 !== 0) {
      issues.push({
        code: "INVALID_ROTATION",
        severity: "error",
        message: `${reference} is rotated by ${rotation} degrees`,
        uuid,
        reference,
      });
    }

    const at = pointKey(component.position);
    const other = byPosition.get(at);
    if (other) {
      issues.push({
        code: "OVERLAPPING_COMPONENTS",
        severity: "warning",
        message: `${reference} sits on top of ${other.reference} at ${at}`,
        uuid,
        reference,
      });
    } else {
      byPosition.set(at, component);
    }
  }

  for (const wire of input.wires) {
    if (wire.isDegenerate) {
      issues.push({
        code: "DEGENERATE_WIRE",
        severity: "error",
        message: `Wire ${wire.uuid} has fewer than two distinct points or a zero-length segment`,
        uuid: wire.uuid,
      });
    }
  }

  return issues;
}
