import type { Signature } from "../ports/state-space"

export type SignatureComparison =
  | { readonly match: true }
  | {
      readonly match: false
      /** First position at which the signatures differ. */
      readonly index: number
      readonly expected: number | undefined
      readonly actual: number | undefined
    }

/**
 * Element-wise comparison of two signatures. A length difference is reported
 * at the first index present in only one of them.
 */
export function compareSignatures(
  expected: Signature,
  actual: Signature,
): SignatureComparison {
  const length = Math.max(expected.length, actual.length)

  for (let index = 0; index < length; index++) {
    if (expected[index] !== actual[index]) {
      return { match: false, index, expected: expected[index], actual: actual[index] }
    }
  }

  return { match: true }
}

export function signaturesEqual(a: Signature, b: Signature): boolean {
  return compareSignatures(a, b).match
}

export function formatSignature(signature: Signature): string {
  return `[${signature.join(", ")}]`
}
