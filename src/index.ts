export { createApp, createTools } from './app';
export { loadConfig, loadDotenv } from './config/env';
export type { AppConfig, LogLevel } from './config/env';
export { createSupabase, RemoteStoreError, SupabaseHistoryRepository } from './config/supabase';
export { HistoryTools } from './tools/historyTools';
export * from './types/chat';
export type * from './types/rows';
export type * from './types/repository';
export * from './types/result';
export { formatMessage, formatMessagesList, formatTimestamp, NO_MESSAGES } from './utils/format';
export { CONTACT_SEARCH_LIMIT, HistoryStore } from './utils/historyStore';
export type { ListChatsOptions, ListMessagesOptions, SaveMessageInput } from './utils/historyStore';
