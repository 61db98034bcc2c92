/**
 * Barrel export for all shared types.
 */
export { DEFAULT_CONFIG } from './config.js';
export type { AgentConfig, LogLevel, ModelConfig, ToolServerConfig, TracingConfig } from './config.js';
export {
    PersonInfoSchema,
    NameReferenceSchema,
    ArticleNamesSchema,
    GENDER_VALUES,
    CONTINENT_VALUES,
} from './person.js';
export type { PersonInfo, NameReference, ArticleNames } from './person.js';
export type { ApplicationSecrets, SecretName, SecretLookup, SecretsProvider } from './secrets.js';
export type {
    ToolArguments,
    ToolDefinition,
    ToolContentBlock,
    ToolOutput,
    ToolCaller,
    ToolCapability,
} from './tool.js';
