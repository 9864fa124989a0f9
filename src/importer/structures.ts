/**
 * Structure merge planning.
 *
 * A structure that already exists at the destination is merged member by
 * member. Members are matched by offset:
 *
 *   same offset, same size and type  → matched, left alone
 *   free, non-overlapping byte range → appended
 *   anything else                    → conflict, skipped
 *
 * Existing members are never resized, retyped or removed. Member names are
 * not compared: renaming a field is not worth a conflict.
 */

import type { StructMember } from "../document/model.js";

export interface MemberConflict {
  incoming: StructMember;
  /** Existing member the incoming one collides with */
  existing: StructMember;
}

export interface StructureMergePlan {
  matched: StructMember[];
  toAppend: StructMember[];
  conflicts: MemberConflict[];
}

function overlaps(a: StructMember, b: StructMember): boolean {
  return a.offset < b.offset + b.size && b.offset < a.offset + a.size;
}

/**
 * Opaque byte-array type used when the destination cannot resolve a
 * member's type name.
 */
export function byteArrayType(size: number): string {
  return `uint8_t[${size}]`;
}

/**
 * Offsets that appear more than once in a member list, ascending.
 */
export function findDuplicateOffsets(members: readonly StructMember[]): number[] {
  const seen = new Set<number>();
  const duplicates = new Set<number>();
  for (const member of members) {
    if (seen.has(member.offset)) {
      duplicates.add(member.offset);
    }
    seen.add(member.offset);
  }
  return [...duplicates].sort((a, b) => a - b);
}

/**
 * Plan the merge of incoming members into an existing member list.
 * Members planned for appending are also checked against each other.
 */
export function planStructureMerge(
  existing: readonly StructMember[],
  incoming: readonly StructMember[]
): StructureMergePlan {
  const plan: StructureMergePlan = { matched: [], toAppend: [], conflicts: [] };

  for (const member of incoming) {
    const sameOffset = existing.find((candidate) => candidate.offset === member.offset);
    if (sameOffset) {
      if (sameOffset.size === member.size && sameOffset.typeName === member.typeName) {
        plan.matched.push(member);
      } else {
        plan.conflicts.push({ incoming: member, existing: sameOffset });
      }
      continue;
    }

    const collision =
      existing.find((candidate) => overlaps(candidate, member)) ??
      plan.toAppend.find((candidate) => overlaps(candidate, member));
    if (collision) {
      plan.conflicts.push({ incoming: member, existing: collision });
      continue;
    }

    plan.toAppend.push(member);
  }

  return plan;
}
