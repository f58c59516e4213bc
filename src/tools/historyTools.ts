import { ChatMessage, ChatSummary, Contact, MessageContext } from '../types/chat';
import { StoreOperationError, StoreResult } from '../types/result';
import { formatMessage, formatMessagesList } from '../utils/format';
import { HistoryStore, ListChatsOptions, ListMessagesOptions, SaveMessageInput } from '../utils/historyStore';
import { logger } from '../utils/logger';

/**
 * Operations as the assistant sees them. Reads fall back to an empty value,
 * writes to `null`/`false`; the one exception is `getMessageContext`, which
 * throws when the anchor message is missing.
 */
export class HistoryTools {
    constructor(private readonly store: HistoryStore) {}

    private settle<T>(result: StoreResult<T>, fallback: T, context: string): T {
        if (result.ok) {
            return result.value;
        }
        logger.error(`Database error in ${context}:`, result.error.message);
        return fallback;
    }

    private resolveName = (senderJid: string): Promise<string> => this.getSenderName(senderJid);

    async getSenderName(senderJid: string): Promise<string> {
        return this.settle(await this.store.getSenderName(senderJid), senderJid, 'getSenderName');
    }

    formatMessage(message: ChatMessage, showChatInfo = true): Promise<string> {
        return formatMessage(message, showChatInfo, this.resolveName);
    }

    formatMessagesList(messages: ChatMessage[], showChatInfo = true): Promise<string> {
        return formatMessagesList(messages, showChatInfo, this.resolveName);
    }

    async listMessages(options: ListMessagesOptions = {}): Promise<string> {
        const result = await this.store.listMessages(options);
        if (!result.ok) {
            logger.error('Database error in listMessages:', result.error.message);
            return `Error: ${result.error.message}`;
        }
        return this.formatMessagesList(result.value, true);
    }

    async getMessageContext(messageId: string, before = 5, after = 5): Promise<MessageContext> {
        const result = await this.store.getMessageContext(messageId, before, after);
        if (!result.ok) {
            logger.error('Database error in getMessageContext:', result.error.message);
            throw new StoreOperationError(result.error);
        }
        return result.value;
    }

    async listChats(options: ListChatsOptions = {}): Promise<ChatSummary[]> {
        return this.settle(await this.store.listChats(options), [], 'listChats');
    }

    async searchContacts(query: string): Promise<Contact[]> {
        return this.settle(await this.store.searchContacts(query), [], 'searchContacts');
    }

    async getContactChats(jid: string, limit = 20, page = 0): Promise<ChatSummary[]> {
        return this.settle(await this.store.getContactChats(jid, limit, page), [], 'getContactChats');
    }

    async getLastInteraction(jid: string): Promise<string | null> {
        const message = this.settle(await this.store.getLastInteraction(jid), null, 'getLastInteraction');
        return message ? this.formatMessage(message) : null;
    }

    async getChat(chatJid: string, includeLastMessage = true): Promise<ChatSummary | null> {
        return this.settle(await this.store.getChat(chatJid, includeLastMessage), null, 'getChat');
    }

    async getDirectChatByContact(senderPhoneNumber: string): Promise<ChatSummary | null> {
        return this.settle(
            await this.store.getDirectChatByContact(senderPhoneNumber),
            null,
            'getDirectChatByContact'
        );
    }

    async saveMessage(input: SaveMessageInput): Promise<string | null> {
        const result = await this.store.saveMessage(input);
        if (!result.ok) {
            logger.error('Error saving message:', result.error.message);
            return null;
        }
        return result.value;
    }

    async updateContactName(jid: string, name: string): Promise<boolean> {
        const result = await this.store.updateContactName(jid, name);
        if (!result.ok) {
            logger.error('Error updating contact name:', result.error.message);
            return false;
        }
        return true;
    }

    async storeChat(jid: string, name: string | undefined, lastMessageTime: string | Date): Promise<string | null> {
        const result = await this.store.storeChat(jid, name, lastMessageTime);
        if (!result.ok) {
            logger.error('Error storing chat:', result.error.message);
            return null;
        }
        return result.value;
    }
}
