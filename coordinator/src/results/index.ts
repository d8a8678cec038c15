/**
 * Results module
 * Decoding and persistence of worker output
 */

export { ResultAggregator } from './aggregator.js';
export type { ItemOutcome, AggregationStats } from './aggregator.js';
export { decodeItem, decodeBase64Strict, outputFilename, safeFilename } from './decoder.js';
export type { ItemDecodeError, DecodedItem, DecodeResult } from './decoder.js';
