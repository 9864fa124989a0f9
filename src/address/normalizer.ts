/**
 * Address normalization between a tool's local numbering and the canonical
 * numbering of an interchange document.
 *
 *   canonical = toolAddress - toolBase + declaredBase
 *   local     = canonical - declaredBase + destinationBase
 *
 * Addresses are opaque byte offsets: no rounding, no alignment. A result
 * that is negative or outside the safe integer range raises
 * AddressRangeError, which callers treat as a per-entry failure.
 *
 * SECTION REBASING:
 * Loaders do not always place sections at the same distance from the image
 * base. When a document carries section ranges and the destination can look
 * sections up by name, an address inside a document section is mapped
 * relative to the same-named destination section instead. Addresses outside
 * every known section fall back to base arithmetic.
 */

import type { Address, SectionRange } from "../document/model.js";

export class AddressRangeError extends Error {
  public readonly address: Address;

  constructor(message: string, address: Address) {
    super(message);
    this.name = "AddressRangeError";
    this.address = address;
  }
}

/** Resolves a destination section by name, if the destination has it */
export type SectionLookup = (name: string) => SectionRange | undefined;

function checked(result: number, source: Address, direction: string): Address {
  if (!Number.isSafeInteger(result) || result < 0) {
    throw new AddressRangeError(
      `Address 0x${source.toString(16)} has no ${direction} equivalent (result ${result})`,
      source
    );
  }
  return result;
}

export class AddressNormalizer {
  private readonly sections: ReadonlyArray<readonly [string, SectionRange]>;

  /**
   * @param declaredBase - The document's base_address
   * @param sections - The document's section ranges, in canonical addresses
   */
  constructor(
    public readonly declaredBase: Address,
    sections: ReadonlyMap<string, SectionRange> = new Map()
  ) {
    this.sections = [...sections].sort(([, a], [, b]) => a.start - b.start);
  }

  /**
   * Tool-local address to canonical address.
   */
  toCanonical(toolAddress: Address, toolBase: Address): Address {
    return checked(toolAddress - toolBase + this.declaredBase, toolAddress, "canonical");
  }

  /**
   * Canonical address to destination-local address.
   */
  toLocal(canonical: Address, destinationBase: Address): Address {
    return checked(canonical - this.declaredBase + destinationBase, canonical, "local");
  }

  /**
   * Name of the document section containing a canonical address.
   */
  sectionOf(canonical: Address): string | undefined {
    for (const [name, range] of this.sections) {
      if (canonical >= range.start && canonical < range.end) {
        return name;
      }
    }
    return undefined;
  }

  /**
   * Canonical address to destination-local address, relative to the
   * containing section where the destination has a section of that name.
   */
  toLocalWithSections(
    canonical: Address,
    destinationBase: Address,
    lookup: SectionLookup
  ): Address {
    const name = this.sectionOf(canonical);
    if (name !== undefined) {
      const source = this.sections.find(([candidate]) => candidate === name);
      const destination = lookup(name);
      if (source && destination) {
        return checked(canonical - source[1].start + destination.start, canonical, "local");
      }
    }
    return this.toLocal(canonical, destinationBase);
  }
}

/**
 * Canonical address for a tool address (free-function form).
 */
export function toCanonical(
  toolAddress: Address,
  toolBase: Address,
  declaredBase: Address
): Address {
  return new AddressNormalizer(declaredBase).toCanonical(toolAddress, toolBase);
}

/**
 * Destination-local address for a canonical address (free-function form).
 */
export function toLocal(
  canonical: Address,
  destinationBase: Address,
  declaredBase: Address
): Address {
  return new AddressNormalizer(declaredBase).toLocal(canonical, destinationBase);
}
