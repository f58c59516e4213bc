import { ConversationRow, MessageRow, NewConversationRow, NewMessageRow } from './rows';

export type ChatSort = 'last_active' | 'name';

export interface MessageQuery {
    after?: Date;
    before?: Date;
    sender?: string;
    chatJid?: string;
    query?: string;
    offset: number;
    limit: number;
}

export interface ConversationQuery {
    query?: string;
    sortBy: ChatSort;
    offset: number;
    limit: number;
}

export type ConversationPatch = Partial<Pick<ConversationRow, 'contact_name' | 'last_message_at'>>;

/**
 * Everything the history store needs from the backing database.
 *
 * Implementations scope every read and write to their `channel` and throw
 * on remote failure; mapping failures to results is the caller's job.
 * Message rows returned by `queryMessages`, `getMessage`, `messagesBefore`
 * and `messagesAfter` carry the joined conversation.
 */
export interface HistoryRepository {
    readonly channel: string;

    findConversation(jid: string): Promise<ConversationRow | null>;
    /** First conversation whose JID contains `fragment` (case-insensitive). */
    findConversationLike(fragment: string, options?: { excludeGroups?: boolean }): Promise<ConversationRow | null>;
    searchConversations(query: ConversationQuery): Promise<ConversationRow[]>;
    /** Non-group conversations matching name or JID, ordered by name. */
    searchContacts(query: string, limit: number): Promise<ConversationRow[]>;
    listConversationsByJid(jid: string, offset: number, limit: number): Promise<ConversationRow[]>;

    /** Newest first. */
    queryMessages(query: MessageQuery): Promise<MessageRow[]>;
    getMessage(id: string): Promise<MessageRow | null>;
    /** Strictly older than `createdAt`, newest first. */
    messagesBefore(conversationId: string, createdAt: string, limit: number): Promise<MessageRow[]>;
    /** Strictly newer than `createdAt`, oldest first. */
    messagesAfter(conversationId: string, createdAt: string, limit: number): Promise<MessageRow[]>;
    latestMessage(conversationId: string): Promise<MessageRow | null>;

    insertConversation(row: NewConversationRow): Promise<string>;
    insertMessage(row: NewMessageRow): Promise<string>;
    updateConversation(id: string, patch: ConversationPatch): Promise<void>;
    updateConversationName(jid: string, name: string): Promise<void>;
}
