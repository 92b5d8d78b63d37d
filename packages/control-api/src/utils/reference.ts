import { customAlphabet } from "nanoid";

export const REFERENCE_PREFIXES = {
  BUILD: "bld-",
  DEPLOYMENT: "dpl-",
} as const;

export type ReferencePrefix =
  (typeof REFERENCE_PREFIXES)[keyof typeof REFERENCE_PREFIXES];

// References end up in image names, which must be lower-case
const lowercase = customAlphabet("abcdefghijklmnopqrstuvwxyz");

export function generateReference(length = 10, prefix?: ReferencePrefix) {
  return `${prefix ?? ""}${lowercase(length)}`;
}
