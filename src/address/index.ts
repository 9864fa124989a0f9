/**
 * Address normalization module.
 */

export {
  AddressNormalizer,
  AddressRangeError,
  toCanonical,
  toLocal,
  type SectionLookup,
} from "./normalizer.js";
