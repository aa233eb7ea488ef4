// Core module exports

// Shared (버전, 지정자, 마커, 요구사항)
export * from './shared';

// Converter
export { translateSpecifiers, formatVersionedCapability, VERSION_STYLES } from './converter/specifierTranslator';
export type { VersionStyle, TranslateOptions } from './converter/specifierTranslator';

export { evaluateMarker, TRUE_RESULT, FALSE_RESULT } from './converter/markerEvaluator';
export type { TranslationResult, MarkerEnvironment, ExtrasInput } from './converter/markerEvaluator';

export { createDynamicMapping, DEFAULT_DYNAMIC_VARIABLES } from './converter/dynamicMapping';
export type {
  CapabilityDescriptor,
  EqualityCapability,
  OrderedCapability,
  DynamicVariableMapping,
  DynamicVariableConfig,
} from './converter/dynamicMapping';

export { RequirementConverter, createRequirementConverter } from './converter/requirementConverter';
export type { RequirementConverterOptions } from './converter/requirementConverter';

export { buildDependencyTags, collectDependencies, matchExtras } from './converter/dependencyTags';
export type { DependencyTagOptions, DependencySet } from './converter/dependencyTags';

// Config
export { ConfigManager, getConfigManager, DEFAULT_CONFIG, parseConfigLayer, mergeConfig } from './config';
export type { Config, ConfigLayer, LogLevel } from './config';
