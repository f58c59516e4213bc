import {
    Chat,
    ChatMessage,
    ChatSummary,
    Contact,
    Direction,
    MediaType,
    MessageContext,
    phonePart
} from '../types/chat';
import { ChatSort, HistoryRepository } from '../types/repository';
import { ConversationRow } from '../types/rows';
import { fail, ok, StoreResult } from '../types/result';
import { rowToChat, rowToContact, rowToMessage, toChatSummary, withLastMessage } from './rows';

export const CONTACT_SEARCH_LIMIT = 50;

export interface ListMessagesOptions {
    after?: string | Date;
    before?: string | Date;
    senderPhoneNumber?: string;
    chatJid?: string;
    query?: string;
    limit?: number;
    page?: number;
    includeContext?: boolean;
    contextBefore?: number;
    contextAfter?: number;
}

export interface ListChatsOptions {
    query?: string;
    limit?: number;
    page?: number;
    includeLastMessage?: boolean;
    sortBy?: ChatSort;
}

export interface SaveMessageInput {
    conversationJid: string;
    sender: string;
    recipient: string;
    body: string;
    direction: Direction;
    externalId?: string;
    mediaType?: MediaType;
    timestamp?: string | Date;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const LOCAL_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

// Время без смещения считаем UTC, как его читает PostgREST
function asUtc(value: string): string {
    if (DATE_ONLY.test(value)) {
        return `${value}T00:00:00Z`;
    }
    const local = LOCAL_DATE_TIME.exec(value);
    return local ? `${local[1]}T${local[2]}Z` : value;
}

function parseInstant(value: string | Date | undefined, field: string): StoreResult<Date | undefined> {
    if (value === undefined || value === '') {
        return ok(undefined);
    }
    const date = value instanceof Date ? value : new Date(asUtc(value.trim()));
    if (Number.isNaN(date.getTime())) {
        return fail('invalid_input', `Invalid ${field} timestamp: ${String(value)}`);
    }
    return ok(date);
}

function checkPaging(limit: number, page: number): StoreResult<{ offset: number; limit: number }> {
    if (!Number.isInteger(limit) || limit < 1) {
        return fail('invalid_input', `limit must be a positive integer, got ${limit}`);
    }
    if (!Number.isInteger(page) || page < 0) {
        return fail('invalid_input', `page must be a non-negative integer, got ${page}`);
    }
    return ok({ offset: page * limit, limit });
}

function checkCount(value: number, field: string): StoreResult<number> {
    if (!Number.isInteger(value) || value < 0) {
        return fail('invalid_input', `${field} must be a non-negative integer, got ${value}`);
    }
    return ok(value);
}

/**
 * Conversations and messages of one channel, read and written through a
 * {@link HistoryRepository}. Every call goes to the repository; nothing is
 * kept between calls. Remote failures come back as `remote_unavailable`.
 */
export class HistoryStore {
    constructor(private readonly repository: HistoryRepository) {}

    private async attempt<T>(operation: string, run: () => Promise<StoreResult<T>>): Promise<StoreResult<T>> {
        try {
            return await run();
        } catch (error) {
            return fail('remote_unavailable', `${operation} failed: ${describe(error)}`, error);
        }
    }

    private async enrich(row: ConversationRow, chat: Chat): Promise<Chat> {
        if (!row.id) {
            return chat;
        }
        return withLastMessage(chat, await this.repository.latestMessage(row.id));
    }

    getSenderName(senderJid: string): Promise<StoreResult<string>> {
        return this.attempt('getSenderName', async () => {
            if (!senderJid) {
                return ok(senderJid);
            }

            const exact = await this.repository.findConversation(senderJid);
            if (exact?.contact_name) {
                return ok(exact.contact_name);
            }

            // Пустой номер совпал бы с любым JID
            const phone = phonePart(senderJid);
            if (!phone) {
                return ok(senderJid);
            }

            // Тот же номер может встречаться в JID с другим суффиксом
            const fuzzy = await this.repository.findConversationLike(phone);
            if (fuzzy?.contact_name) {
                return ok(fuzzy.contact_name);
            }

            return ok(senderJid);
        });
    }

    listMessages(options: ListMessagesOptions = {}): Promise<StoreResult<ChatMessage[]>> {
        return this.attempt('listMessages', async () => {
            const after = parseInstant(options.after, 'after');
            if (!after.ok) return after;
            const before = parseInstant(options.before, 'before');
            if (!before.ok) return before;
            const paging = checkPaging(options.limit ?? 20, options.page ?? 0);
            if (!paging.ok) return paging;

            const rows = await this.repository.queryMessages({
                after: after.value,
                before: before.value,
                sender: options.senderPhoneNumber || undefined,
                chatJid: options.chatJid || undefined,
                query: options.query || undefined,
                offset: paging.value.offset,
                limit: paging.value.limit
            });
            const messages = rows.map(row => rowToMessage(row));

            if (!(options.includeContext ?? true) || messages.length === 0) {
                return ok(messages);
            }

            // Окна соседних сообщений могут пересекаться: каждое сообщение выводим один раз
            const seen = new Set<string>();
            const expanded: ChatMessage[] = [];
            for (const message of messages) {
                const context = await this.getMessageContext(
                    message.id,
                    options.contextBefore ?? 1,
                    options.contextAfter ?? 1
                );
                if (!context.ok) return context;

                const window = [...context.value.before, context.value.message, ...context.value.after];
                for (const item of window) {
                    if (!seen.has(item.id)) {
                        seen.add(item.id);
                        expanded.push(item);
                    }
                }
            }
            return ok(expanded);
        });
    }

    getMessageContext(messageId: string, before = 5, after = 5): Promise<StoreResult<MessageContext>> {
        return this.attempt('getMessageContext', async () => {
            if (!messageId) {
                return fail('invalid_input', 'message id is required');
            }
            const beforeCount = checkCount(before, 'before');
            if (!beforeCount.ok) return beforeCount;
            const afterCount = checkCount(after, 'after');
            if (!afterCount.ok) return afterCount;

            const target = await this.repository.getMessage(messageId);
            if (!target) {
                return fail('not_found', `Message with ID ${messageId} not found`);
            }

            const earlier = beforeCount.value > 0
                ? await this.repository.messagesBefore(target.conversation_id, target.created_at, beforeCount.value)
                : [];
            const later = afterCount.value > 0
                ? await this.repository.messagesAfter(target.conversation_id, target.created_at, afterCount.value)
                : [];

            return ok({
                message: rowToMessage(target),
                before: [...earlier].reverse().map(row => rowToMessage(row)),
                after: later.map(row => rowToMessage(row))
            });
        });
    }

    listChats(options: ListChatsOptions = {}): Promise<StoreResult<ChatSummary[]>> {
        return this.attempt('listChats', async () => {
            const paging = checkPaging(options.limit ?? 20, options.page ?? 0);
            if (!paging.ok) return paging;

            const rows = await this.repository.searchConversations({
                query: options.query || undefined,
                sortBy: options.sortBy ?? 'last_active',
                ...paging.value
            });

            const chats: ChatSummary[] = [];
            for (const row of rows) {
                let chat = rowToChat(row);
                if (options.includeLastMessage ?? true) {
                    chat = await this.enrich(row, chat);
                }
                chats.push(toChatSummary(chat));
            }
            return ok(chats);
        });
    }

    searchContacts(query: string): Promise<StoreResult<Contact[]>> {
        return this.attempt('searchContacts', async () => {
            const rows = await this.repository.searchContacts(query, CONTACT_SEARCH_LIMIT);
            return ok(rows.map(rowToContact));
        });
    }

    getContactChats(jid: string, limit = 20, page = 0): Promise<StoreResult<ChatSummary[]>> {
        return this.attempt('getContactChats', async () => {
            const paging = checkPaging(limit, page);
            if (!paging.ok) return paging;

            const rows = await this.repository.listConversationsByJid(jid, paging.value.offset, paging.value.limit);
            return ok(rows.map(row => toChatSummary(rowToChat(row))));
        });
    }

    getLastInteraction(jid: string): Promise<StoreResult<ChatMessage | null>> {
        return this.attempt('getLastInteraction', async () => {
            const conversation = await this.repository.findConversation(jid);
            if (!conversation) {
                return ok(null);
            }

            const last = await this.repository.latestMessage(conversation.id);
            if (!last) {
                return ok(null);
            }
            return ok(rowToMessage(last, conversation.contact_name));
        });
    }

    getChat(chatJid: string, includeLastMessage = true): Promise<StoreResult<ChatSummary | null>> {
        return this.attempt('getChat', async () => {
            const row = await this.repository.findConversation(chatJid);
            if (!row) {
                return ok(null);
            }

            const chat = includeLastMessage ? await this.enrich(row, rowToChat(row)) : rowToChat(row);
            return ok(toChatSummary(chat));
        });
    }

    getDirectChatByContact(senderPhoneNumber: string): Promise<StoreResult<ChatSummary | null>> {
        return this.attempt('getDirectChatByContact', async () => {
            if (!senderPhoneNumber) {
                return fail('invalid_input', 'phone number is required');
            }

            const row = await this.repository.findConversationLike(senderPhoneNumber, { excludeGroups: true });
            if (!row) {
                return ok(null);
            }
            return ok(toChatSummary(await this.enrich(row, rowToChat(row))));
        });
    }

    private async conversationIdFor(jid: string, name: string | null): Promise<{ id: string; created: boolean }> {
        const existing = await this.repository.findConversation(jid);
        if (existing) {
            return { id: existing.id, created: false };
        }

        const id = await this.repository.insertConversation({
            channel: this.repository.channel,
            contact_identifier: jid,
            contact_name: name,
            status: 'active'
        });
        return { id, created: true };
    }

    /**
     * Appends a message, creating the conversation on first contact and
     * moving its `last_message_at` to the message time. A failure after the
     * conversation was created leaves it in place.
     */
    saveMessage(input: SaveMessageInput): Promise<StoreResult<string>> {
        return this.attempt('saveMessage', async () => {
            if (!input.conversationJid) {
                return fail('invalid_input', 'conversation JID is required');
            }
            if (!input.body && !input.mediaType) {
                return fail('invalid_input', 'message has neither body nor media');
            }
            const timestamp = parseInstant(input.timestamp, 'message');
            if (!timestamp.ok) return timestamp;

            const conversation = await this.conversationIdFor(input.conversationJid, null);
            const at = (timestamp.value ?? new Date()).toISOString();

            const messageId = await this.repository.insertMessage({
                conversation_id: conversation.id,
                channel: this.repository.channel,
                direction: input.direction,
                sender: input.sender,
                recipient: input.recipient,
                body: input.body,
                created_at: at,
                updated_at: at,
                topic: 'chat',
                extension: 'text',
                external_id: input.externalId ?? null,
                metadata: input.mediaType ? { media_type: input.mediaType } : null
            });

            await this.repository.updateConversation(conversation.id, { last_message_at: at });
            return ok(messageId);
        });
    }

    updateContactName(jid: string, name: string): Promise<StoreResult<void>> {
        return this.attempt('updateContactName', async () => {
            if (!jid) {
                return fail('invalid_input', 'JID is required');
            }
            await this.repository.updateConversationName(jid, name);
            return ok(undefined);
        });
    }

    /** Registers a chat seen on the device and records its latest activity. */
    storeChat(jid: string, name: string | undefined, lastMessageTime: string | Date): Promise<StoreResult<string>> {
        return this.attempt('storeChat', async () => {
            if (!jid) {
                return fail('invalid_input', 'JID is required');
            }
            const at = parseInstant(lastMessageTime, 'last message');
            if (!at.ok) return at;

            const conversation = await this.conversationIdFor(jid, name || null);
            if (name && !conversation.created) {
                await this.repository.updateConversationName(jid, name);
            }
            if (at.value) {
                await this.repository.updateConversation(conversation.id, { last_message_at: at.value.toISOString() });
            }
            return ok(conversation.id);
        });
    }
}
