export {
  normalizeCompanyName,
  createNormalizer,
  createNormalizerConfig,
  configFromPolicy,
  coerceName,
  toTitleCase,
  DEFAULT_NORMALIZER_CONFIG,
  REWRITE_RULES,
} from './normalize';
export type { NormalizerConfig, Normalizer, RewriteRule } from './normalize';

export {
  tokenSetRatio,
  tokenSet,
  ratio,
  indelDistance,
  prepareName,
  preparedTokenSetRatio,
} from './similarity';
export type { SimilarityScorer, PreparedName } from './similarity';

export { groupNames, groupEntities, assertThreshold, RepresentativeIndex } from './group';
export type { RepresentativeMatch, NameGroup } from './group';

export { cleanCompanyNames, cleanTable, resolveSourceColumn, summarizeCleaning } from './clean';

export { InvalidThresholdError, UnknownColumnError, InvalidCleanOptionsError } from './errors';
