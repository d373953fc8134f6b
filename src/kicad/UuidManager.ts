import * as crypto from "crypto";
import { DuplicateIdError } from "@sch/errors";

/**
 * Keeps track of every identifier used in a document and hands out fresh ones.
 *
 * Identifiers read from a file are reserved as they are; generated ones are
 * drawn until an unused value comes up.
 */
export class UuidManager {
  private used = new Set<string>();

  constructor(private readonly generator: () => string = () => crypto.randomUUID()) {}

  get size(): number {
    return this.used.size;
  }

  has(uuid: string): boolean {
    return this.used.has(uuid);
  }

  /**
   * Marks an identifier as used. Returns false when it already was.
   */
  reserve(uuid: string): boolean {
    if (this.used.has(uuid)) return false;
    this.used.add(uuid);
    return true;
  }

  /** Like `reserve`, but a clash is an error. */
  claim(uuid: string, kind?: string): string {
    if (!this.reserve(uuid)) throw new DuplicateIdError(uuid, kind);
    return uuid;
  }

  release(uuid: string): void {
    this.used.delete(uuid);
  }

  /** Fresh identifier, reserved before it is returned. */
  next(): string {
    for (let attempt = 0; attempt < 1000; attempt++) {
      const candidate = this.generator();
      if (this.reserve(candidate)) return candidate;
    }
    throw new DuplicateIdError("<generated>", "generator keeps returning identifiers already in use");
  }
}
