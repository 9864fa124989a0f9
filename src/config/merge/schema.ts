/**
 * Merge options schema.
 *
 * Options are resolved once per import run and frozen. A run never changes
 * policy halfway through, so the summary of one run always reflects a single
 * set of rules.
 */

import { z } from "zod";
import { ConflictPolicy, CommentMerge, RecordCategory } from "./enums.js";

export const MergeOptionsSchema = z
  .object({
    /** Applied to names, comments and structures when destination data differs */
    conflictPolicy: ConflictPolicy,

    /** How differing comments are reconciled before the conflict policy applies */
    commentMerge: CommentMerge,

    /** Write imported names as user-assigned (protected on later imports) */
    markImportedNamesAsUser: z.boolean(),

    /** Substitute uint8_t[size] for member types the destination does not know */
    substituteUnknownTypes: z.boolean(),

    /** Categories to apply; the rest are left untouched */
    categories: z.array(RecordCategory).min(1),

    /** Base address of the destination image; defaults to the destination's own */
    destinationBase: z.number().int().nonnegative().optional(),
  })
  .strict();

export type MergeOptions = z.infer<typeof MergeOptionsSchema>;
