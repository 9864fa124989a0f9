/**
 * Offline document edits.
 *
 * These helpers never mutate their input: each returns a new frozen model.
 * They back the CLI's add-* and convert commands, which edit a document
 * without any host database involved.
 */

import { AddressNormalizer } from "../address/normalizer.js";
import type { RecordCategory } from "../config/merge/enums.js";
import {
  createRecordModel,
  toModelInit,
  type Address,
  type RecordModel,
  type SectionRange,
} from "./model.js";

/**
 * Mark a function start and name it.
 */
export function addFunction(model: RecordModel, address: Address, name: string): RecordModel {
  const names = new Map(model.names);
  names.set(address, name);
  return createRecordModel({
    ...toModelInit(model),
    functions: [...model.functions, address],
    names,
  });
}

/**
 * Name a data address. The address is not marked as a function.
 */
export function addVariable(model: RecordModel, address: Address, name: string): RecordModel {
  const names = new Map(model.names);
  names.set(address, name);
  return createRecordModel({ ...toModelInit(model), names });
}

/**
 * Set the address comment at an address, replacing any previous one.
 */
export function addComment(model: RecordModel, address: Address, text: string): RecordModel {
  const comments = new Map(model.comments);
  comments.set(address, text);
  return createRecordModel({ ...toModelInit(model), comments });
}

/**
 * Re-express every address relative to a new base.
 *
 * @throws AddressRangeError if any address would become negative
 */
export function rebaseDocument(model: RecordModel, newBase: Address): RecordModel {
  const normalizer = new AddressNormalizer(newBase);
  const move = (address: Address) => normalizer.toCanonical(address, model.baseAddress);
  const moveEntries = (entries: ReadonlyMap<Address, string>) =>
    [...entries].map(([address, value]): [Address, string] => [move(address), value]);

  return createRecordModel({
    ...toModelInit(model),
    baseAddress: newBase,
    sections: [...model.sections].map(([name, range]): [string, SectionRange] => [
      name,
      { start: move(range.start), end: move(range.end) },
    ]),
    functions: [...model.functions].map(move),
    names: moveEntries(model.names),
    comments: moveEntries(model.comments),
    functionComments: moveEntries(model.functionComments),
  });
}

/**
 * Keep only the listed categories; the others become empty.
 */
export function filterCategories(
  model: RecordModel,
  categories: readonly RecordCategory[]
): RecordModel {
  const keep = new Set(categories);
  const init = toModelInit(model);
  return createRecordModel({
    ...init,
    functions: keep.has("functions") ? init.functions : [],
    names: keep.has("names") ? init.names : [],
    comments: keep.has("comments") ? init.comments : [],
    functionComments: keep.has("function_comments") ? init.functionComments : [],
    structures: keep.has("structures") ? init.structures : [],
  });
}
