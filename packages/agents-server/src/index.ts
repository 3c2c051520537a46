export { TurnCoordinator, InvalidSessionIdError, type TurnCoordinatorOptions, type TurnCoordinatorDeps } from './services/turn-coordinator'
export { TurnContext, TurnContextError, FIELD_OWNERS, OWNED_FIELDS, type OwnedField, type TurnPhase } from './services/turn-context'
export { CachedSessionStateStore, type SessionStateStore, type JournalPage } from './services/session-store'
export { InMemoryKeyValueStore, JsonFileKeyValueStore, type KeyValueStore } from './services/kv-store'
export { MessageLog } from './services/message-log'
export {
  ProviderError,
  createCapabilities,
  invokeCapability,
  type Capabilities,
  type CapabilityOutcome,
  type CapabilityProviders
} from './services/capabilities'
export { createProvidersFromConfig } from './services/providers'
export { loadConfig, getConfig, ConfigError, type AppConfig } from './services/config'
export { createCoordinator, getCoordinator, setCoordinator, resetCoordinator } from './services/agents-container'
export { AgentFailure, type Agent, type AgentSet } from './agents/agent'
export { FallbackAgent } from './agents/fallback'
