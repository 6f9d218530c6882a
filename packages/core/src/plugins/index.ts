export type {
    ToolPlugin,
    ExecutionContext,
    RunOutcome,
    ToolArgs,
    ProgressSink,
    PluginFactory,
    PluginSource,
    RegisteredPlugin,
} from './types.js';
export {
    CAPABILITY_KINDS,
    RUN_STATUSES,
    CapabilityKindSchema,
    CapabilityValueSchema,
    CapabilityDescriptorSchema,
    PluginDescriptorSchema,
    RunStatusSchema,
    RunOutcomeSchema,
    type CapabilityKind,
    type CapabilityValue,
    type CapabilityDescriptor,
    type CapabilityDescriptorInput,
    type PluginDescriptor,
    type RunStatus,
    type RunOutcomeInput,
} from './schemas.js';
export {
    validateCapabilities,
    findCapabilityViolations,
    buildArgumentSurface,
    coerceArguments,
    capabilitiesToZodSchema,
    capabilitiesToJsonSchema,
    isSubcommandCapability,
    toFlagName,
    matchesKind,
    SUBCOMMAND_CAPABILITY,
    type ArgumentSpec,
    type RawArguments,
} from './capabilities.js';
export { PluginExecutionContext, clampFraction, type ExecutionContextOptions } from './context.js';
export {
    createRunOutcome,
    failureOutcome,
    cancelledOutcome,
    parseRunOutcome,
    type ParsedOutcome,
} from './outcome.js';
export { isToolPlugin, validateToolPlugin, type ValidatedPlugin } from './validate-plugin.js';
export {
    findNativePluginEntries,
    loadNativeFactory,
    parseEntryReference,
    type NativePluginEntry,
    type NativeCandidate,
    type ModuleImporter,
} from './native-source.js';
export { PluginRegistry, discoverPlugins, type DiscoverPluginsOptions } from './registry.js';
export { PluginError } from './errors.js';
export { PluginErrorCode } from './error-codes.js';
export * from './process/index.js';
