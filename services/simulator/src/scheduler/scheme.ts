import YAML from "yaml";
import type { z } from "zod";

import { toError } from "../utils/errorUtils.js";
import type { TypeMeta } from "./types.js";

export type SchemeErrorCode = "malformed" | "missing-type-meta" | "not-registered" | "invalid";

export class SchemeError extends Error {
  readonly code: SchemeErrorCode;

  constructor(code: SchemeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchemeError";
    this.code = code;
  }
}

type KindDecoder<T> = (value: Record<string, unknown>) => T;

function typeKey(apiVersion: string, kind: string): string {
  return `${apiVersion}, Kind=${kind}`;
}

function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

function readTypeField(record: Record<string, unknown>, field: keyof TypeMeta): string | undefined {
  const value = record[field];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Registry of versioned object kinds. Each kind is decoded by the schema it
 * was registered with, selected by the object's `apiVersion` and `kind`.
 */
export class Scheme<TObject extends TypeMeta> {
  private readonly kinds = new Map<string, KindDecoder<TObject>>();

  constructor(private readonly label: string) {}

  register<T extends TObject>(apiVersion: T["apiVersion"], kind: T["kind"], schema: z.ZodType<T>): this {
    const key = typeKey(apiVersion, kind);
    if (this.kinds.has(key)) {
      throw new Error(`${this.label} kind ${key} is already registered`);
    }
    this.kinds.set(key, value => {
      const parsed = schema.safeParse(value);
      if (!parsed.success) {
        throw new SchemeError("invalid", `invalid ${kind}: ${formatIssues(parsed.error.issues)}`, {
          cause: parsed.error,
        });
      }
      return parsed.data;
    });
    return this;
  }

  recognizes(typeMeta: TypeMeta): boolean {
    return this.kinds.has(typeKey(typeMeta.apiVersion, typeMeta.kind));
  }

  /**
   * Parses a YAML or JSON document and decodes it as the kind named by its
   * own type fields.
   */
  decode(data: Uint8Array | string): TObject {
    const text = typeof data === "string" ? data : Buffer.from(data).toString("utf-8");
    let document: unknown;
    try {
      document = YAML.parse(text, { version: "1.1" });
    } catch (error) {
      throw new SchemeError("malformed", `${this.label} document is not valid YAML: ${toError(error).message}`, {
        cause: error,
      });
    }
    return this.decodeObject(document);
  }

  /**
   * Decodes an already parsed value. Type fields missing from the value are
   * taken from `defaults`.
   */
  decodeObject(value: unknown, defaults?: Partial<TypeMeta>): TObject {
    const record = asRecord(value);
    if (!record) {
      throw new SchemeError("malformed", `${this.label} document must be a mapping`);
    }
    const apiVersion = readTypeField(record, "apiVersion") ?? defaults?.apiVersion;
    const kind = readTypeField(record, "kind") ?? defaults?.kind;
    if (!apiVersion || !kind) {
      throw new SchemeError("missing-type-meta", `${this.label} document is missing apiVersion or kind`);
    }
    const decodeKind = this.kinds.get(typeKey(apiVersion, kind));
    if (!decodeKind) {
      throw new SchemeError("not-registered", `no ${this.label} kind "${kind}" is registered for version "${apiVersion}"`);
    }
    return decodeKind({ ...record, apiVersion, kind });
  }
}
