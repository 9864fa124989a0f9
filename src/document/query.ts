/**
 * Address context queries over a document.
 *
 * A query returns the entry at an address together with up to `before`
 * and `after` neighbouring addresses that carry records. When nothing is
 * recorded at the queried address, its neighbours are still reported and
 * the current entry holds only the address.
 */

import { collectAddresses, type Address, type RecordModel } from "./model.js";

export interface AddressEntry {
  address: Address;
  name?: string;
  function?: boolean;
  comment?: string;
  functionComment?: string;
}

export interface QueryResult {
  address: Address;
  before: AddressEntry[];
  current: AddressEntry;
  after: AddressEntry[];
}

export function formatAddress(address: Address): string {
  return `0x${address.toString(16)}`;
}

/**
 * Everything the document records at one address.
 */
export function entryAt(model: RecordModel, address: Address): AddressEntry {
  const entry: AddressEntry = { address };
  const name = model.names.get(address);
  if (name !== undefined) entry.name = name;
  if (model.functions.has(address)) entry.function = true;
  const comment = model.comments.get(address);
  if (comment !== undefined) entry.comment = comment;
  const functionComment = model.functionComments.get(address);
  if (functionComment !== undefined) entry.functionComment = functionComment;
  return entry;
}

/**
 * Index of the first element not less than `target` in a sorted array.
 */
function lowerBound(sorted: readonly Address[], target: Address): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

export function queryAddress(
  model: RecordModel,
  address: Address,
  before: number,
  after: number
): QueryResult {
  const addresses = collectAddresses(model);
  const index = lowerBound(addresses, address);
  const found = index < addresses.length && addresses[index] === address;
  const afterStart = found ? index + 1 : index;

  return {
    address,
    before: addresses
      .slice(Math.max(0, index - before), index)
      .map((neighbour) => entryAt(model, neighbour)),
    current: found ? entryAt(model, address) : { address },
    after: addresses
      .slice(afterStart, afterStart + after)
      .map((neighbour) => entryAt(model, neighbour)),
  };
}

/**
 * Escape a comment so that it fits on one line inside double quotes.
 */
export function escapeComment(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

/**
 * One-line rendering of an entry, e.g. `0x1000 name=main function`.
 */
export function formatEntry(entry: AddressEntry): string {
  const parts = [formatAddress(entry.address)];
  if (entry.name !== undefined) parts.push(`name=${entry.name}`);
  if (entry.function) parts.push("function");
  if (entry.comment !== undefined) parts.push(`comment="${escapeComment(entry.comment)}"`);
  if (entry.functionComment !== undefined) {
    parts.push(`function_comment="${escapeComment(entry.functionComment)}"`);
  }
  if (parts.length === 1) parts.push("no_entry");
  return parts.join(" ");
}

/**
 * Terminal rendering of a query; the queried address is marked with ">".
 */
export function renderQuery(result: QueryResult): string {
  return [
    ...result.before.map((entry) => `  ${formatEntry(entry)}`),
    `> ${formatEntry(result.current)}`,
    ...result.after.map((entry) => `  ${formatEntry(entry)}`),
  ].join("\n");
}

/**
 * JSON rendering of a query, with hex addresses.
 */
export function queryToJson(result: QueryResult): Record<string, unknown> {
  const entryJson = (entry: AddressEntry): Record<string, string | boolean> => {
    const json: Record<string, string | boolean> = { address: formatAddress(entry.address) };
    if (entry.name !== undefined) json.name = entry.name;
    if (entry.function) json.function = true;
    if (entry.comment !== undefined) json.comment = entry.comment;
    if (entry.functionComment !== undefined) json.function_comment = entry.functionComment;
    return json;
  };

  return {
    address: formatAddress(result.address),
    before: result.before.map(entryJson),
    current: entryJson(result.current),
    after: result.after.map(entryJson),
  };
}
