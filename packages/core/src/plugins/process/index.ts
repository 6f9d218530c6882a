export { ProcessPlugin, AUTH_TOKEN_ENV, type ProcessRunOptions } from './process-plugin.js';
export { introspectBinary, type IntrospectionResult } from './introspect.js';
export {
    readIntrospectionCache,
    writeIntrospectionCache,
    upsertIntrospectionCacheEntry,
    removeIntrospectionCacheEntry,
    IntrospectionCacheEntrySchema,
    CACHE_VERSION,
    type IntrospectionCache,
    type IntrospectionCacheEntry,
} from './introspection-cache.js';
export {
    INTROSPECT_FLAG,
    EXECUTE_FLAG,
    WireDescriptorSchema,
    WireParamSchema,
    WireResultSchema,
    ProgressEventSchema,
    wireToDescriptor,
    descriptorToWire,
    parseProgressLine,
    parseTerminalResult,
    type WireDescriptor,
    type WireParam,
    type WireResult,
    type ProgressEvent,
} from './protocol.js';
