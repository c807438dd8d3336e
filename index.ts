export type {
  EnzymeEntry,
  EnzymeKineticParameters,
  LogLevel,
  OptimizationResult,
  ParameterOverrides,
  RateBreakdown,
  ReactionConditions,
  SearchBounds,
  SimulationOutcome,
} from './types';
export { loadConfig, type AppConfig } from './constants';
export {
  DatasetFormatError,
  DatasetSourceError,
  InvalidParameterError,
  KineticsError,
  LookupError,
  MissingParameterError,
} from './services/kinetics/errors';
export {
  effectiveKm,
  gaussianFactor,
  simulate,
  simulateDetailed,
  simulateReactionRate,
  type ReactionRateArgs,
} from './services/kinetics/reactionRate';
export {
  EnzymeStore,
  clearStoreCache,
  getEnzymeKinetics,
  getStore,
  normalizeKeys,
  type DatasetSource,
} from './services/kinetics/enzymeStore';
export { optimizeReaction, type OptimizeOptions } from './services/kinetics/optimizeReaction';
export {
  clearSabioCache,
  fetchSabioKinetics,
  parseSabioText,
  sabioToParameters,
  type SabioKinetics,
} from './services/sabio';
export { logger, setLogLevel } from './services/logger';
