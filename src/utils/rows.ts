import { Chat, ChatMessage, ChatSummary, Contact, MEDIA_TYPES, MediaType, phonePart } from '../types/chat';
import { ConversationRow, LastMessageRow, MessageRow } from '../types/rows';

function isMediaType(value: string): value is MediaType {
    return MEDIA_TYPES.some(type => type === value);
}

export function parseMediaType(row: Pick<MessageRow, 'metadata'>): MediaType | undefined {
    const raw = row.metadata?.media_type;
    if (typeof raw !== 'string' || raw === '') {
        return undefined;
    }
    const normalized = raw.toLowerCase();
    return isMediaType(normalized) ? normalized : 'unknown';
}

export function rowToMessage(row: MessageRow, conversationName?: string | null): ChatMessage {
    const isFromMe = row.direction === 'outbound';
    const conversation = row.conversations ?? null;

    // Чат определяется другой стороной переписки
    const chatJid = (isFromMe ? row.recipient : row.sender) || conversation?.contact_identifier || '';
    const chatName = conversationName ?? conversation?.contact_name ?? undefined;

    const message: ChatMessage = {
        id: String(row.id),
        timestamp: new Date(row.created_at),
        sender: row.sender ?? '',
        content: row.body ?? '',
        isFromMe,
        chatJid
    };

    if (chatName) {
        message.chatName = chatName;
    }
    const mediaType = parseMediaType(row);
    if (mediaType) {
        message.mediaType = mediaType;
    }
    return message;
}

export function rowToChat(row: ConversationRow): Chat {
    return {
        jid: row.contact_identifier ?? '',
        name: row.contact_name,
        lastMessageTime: row.last_message_at ? new Date(row.last_message_at) : null
    };
}

export function withLastMessage(chat: Chat, last: LastMessageRow | null): Chat {
    if (!last) {
        return chat;
    }
    return {
        ...chat,
        lastMessage: last.body ?? undefined,
        lastSender: last.sender ?? undefined,
        lastIsFromMe: last.direction === 'outbound'
    };
}

export function toChatSummary(chat: Chat): ChatSummary {
    const summary: ChatSummary = {
        jid: chat.jid,
        name: chat.name,
        last_message_time: chat.lastMessageTime ? chat.lastMessageTime.toISOString() : null
    };
    if (chat.lastIsFromMe !== undefined) {
        summary.last_message = chat.lastMessage;
        summary.last_sender = chat.lastSender;
        summary.last_is_from_me = chat.lastIsFromMe;
    }
    return summary;
}

export function rowToContact(row: ConversationRow): Contact {
    const jid = row.contact_identifier ?? '';
    return {
        phone_number: phonePart(jid),
        name: row.contact_name,
        jid
    };
}
