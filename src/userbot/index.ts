export { TelegramUserbot, parseEntityId, entityTitle } from './TelegramUserbot';
export type { UserbotConfig } from './TelegramUserbot';
export { SessionManager } from './SessionManager';
export type { SessionInfo, SessionMetadata } from './SessionManager';
export { createUserbotConfig, validateEnvironmentVariables } from './config';
export { toChatMessage } from './messageMapper';
export { registerSessionCommands } from './session-cli';
