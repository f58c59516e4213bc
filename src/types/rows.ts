import { Direction } from './chat';

// Строки таблиц Supabase, как их возвращает PostgREST

export interface ConversationRow {
    id: string;
    channel: string;
    contact_identifier: string;
    contact_name: string | null;
    status: string;
    last_message_at: string | null;
}

export interface JoinedConversation {
    contact_identifier: string;
    contact_name: string | null;
}

export interface MessageMetadata {
    media_type?: string;
    [key: string]: unknown;
}

export interface MessageRow {
    id: string;
    conversation_id: string;
    channel: string;
    direction: Direction;
    sender: string | null;
    recipient: string | null;
    body: string | null;
    created_at: string;
    updated_at: string | null;
    topic: string | null;
    extension: string | null;
    external_id: string | null;
    metadata: MessageMetadata | null;
    conversations?: JoinedConversation | null;
}

export type LastMessageRow = Pick<MessageRow, 'body' | 'sender' | 'direction'>;

export type NewConversationRow = Pick<ConversationRow, 'channel' | 'contact_identifier' | 'contact_name' | 'status'>;

export type NewMessageRow = Omit<MessageRow, 'id' | 'conversations'>;
