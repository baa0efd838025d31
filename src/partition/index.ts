/**
 * Proposal tokenising and partition validation.
 *
 * @packageDocumentation
 */

export type {
  SeriesPartition,
  InequalityPartition,
  Partition,
  Subdomain,
  MalformedProposalCode,
} from './types.js';
export { MalformedPartitionError } from './types.js';
export { parseProposalList } from './tokenizer.js';
export {
  validateSeriesPartition,
  validateInequalityPartition,
  validatePartition,
  defaultPartition,
  partitionElements,
  type Proposal,
} from './validator.js';
