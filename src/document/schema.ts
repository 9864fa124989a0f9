/**
 * Interchange document wire schema.
 *
 * This is the on-disk JSON layout both host tools read and write. Keys use
 * snake_case, addresses in map keys are decimal strings, and every category
 * is present even when empty.
 *
 * VERSIONING:
 * schema_version is a plain integer. A decoder accepts only the versions in
 * SUPPORTED_SCHEMA_VERSIONS; anything else is a SchemaError rather than a
 * best-effort read, because a misread layout would corrupt the destination.
 */

import { z } from "zod";
import type { SchemaMode } from "../config/merge/enums.js";

/** Version written by this encoder */
export const SCHEMA_VERSION = 1;

/** Versions this decoder understands */
export const SUPPORTED_SCHEMA_VERSIONS: readonly number[] = [1];

/** Keys that must be present in every document */
export const REQUIRED_TOP_LEVEL_KEYS = [
  "schema_version",
  "binary_identifier",
  "base_address",
  "functions",
  "names",
  "comments",
  "structures",
] as const;

/** Recognized keys that default to empty when absent */
export const OPTIONAL_TOP_LEVEL_KEYS = ["sections", "function_comments"] as const;

export const KNOWN_TOP_LEVEL_KEYS: readonly string[] = [
  ...REQUIRED_TOP_LEVEL_KEYS,
  ...OPTIONAL_TOP_LEVEL_KEYS,
];

const DECIMAL_KEY = /^(0|[1-9][0-9]*)$/;
const HEX_KEY = /^0[xX][0-9a-fA-F]+$/;

/**
 * Address value: non-negative integer that survives a JSON round trip.
 */
export const AddressSchema = z
  .number()
  .int("address must be an integer")
  .nonnegative("address must not be negative")
  .max(Number.MAX_SAFE_INTEGER, "address exceeds the safe integer range");

/**
 * Parse a validated address key. Hex keys are only produced by lenient
 * decoding.
 */
export function parseAddressKey(key: string): number {
  return HEX_KEY.test(key) ? parseInt(key.slice(2), 16) : Number(key);
}

function addressKeySchema(mode: SchemaMode) {
  const pattern = mode === "lenient"
    ? (key: string) => DECIMAL_KEY.test(key) || HEX_KEY.test(key)
    : (key: string) => DECIMAL_KEY.test(key);
  const expected = mode === "lenient" ? "decimal or 0x-prefixed hex" : "decimal";

  return z
    .string()
    .refine(pattern, { message: `address key must be a ${expected} integer` })
    .refine((key) => Number.isSafeInteger(parseAddressKey(key)), {
      message: "address key exceeds the safe integer range",
    });
}

export const StructMemberSchema = z
  .object({
    offset: z.number().int("offset must be an integer").nonnegative("offset must not be negative"),
    size: z.number().int("size must be an integer").positive("size must be positive"),
    type_name: z.string().min(1, "type_name must not be empty"),
    member_name: z.string(),
  })
  .strict();

export type WireStructMember = z.infer<typeof StructMemberSchema>;

export const SectionSchema = z
  .object({
    start: AddressSchema,
    end: AddressSchema,
  })
  .strict()
  .refine((section) => section.end >= section.start, {
    message: "section end must not precede its start",
  });

/**
 * Schema for the recognized top-level keys. Presence of required keys and
 * the version check happen before this runs; unknown keys are handled by
 * the codec according to the schema mode.
 */
export function buildDocumentSchema(mode: SchemaMode) {
  const addressKey = addressKeySchema(mode);

  return z.object({
    schema_version: z.number().int(),
    binary_identifier: z.string(),
    base_address: AddressSchema,
    sections: z.record(z.string(), SectionSchema).default({}),
    functions: z.array(AddressSchema),
    names: z.record(addressKey, z.string()),
    comments: z.record(addressKey, z.string()),
    function_comments: z.record(addressKey, z.string()).default({}),
    structures: z.record(z.string(), z.array(StructMemberSchema)),
  });
}

export type InterchangeFile = z.infer<ReturnType<typeof buildDocumentSchema>>;
