export type Direction = 'inbound' | 'outbound';

export const MEDIA_TYPES = ['image', 'video', 'audio', 'document', 'sticker', 'unknown'] as const;

export type MediaType = typeof MEDIA_TYPES[number];

export const GROUP_JID_SUFFIX = '@g.us';

export interface ChatMessage {
    id: string;
    timestamp: Date;
    sender: string;
    content: string;
    isFromMe: boolean;
    chatJid: string;
    chatName?: string;
    mediaType?: MediaType;
}

export interface Chat {
    jid: string;
    name: string | null;
    lastMessageTime: Date | null;
    lastMessage?: string;
    lastSender?: string;
    lastIsFromMe?: boolean;
}

// То, что получает слой инструментов: plain-объект в snake_case
export interface ChatSummary {
    jid: string;
    name: string | null;
    last_message_time: string | null;
    last_message?: string;
    last_sender?: string;
    last_is_from_me?: boolean;
}

export interface Contact {
    phone_number: string;
    name: string | null;
    jid: string;
}

export interface MessageContext {
    message: ChatMessage;
    before: ChatMessage[];
    after: ChatMessage[];
}

export function isGroupJid(jid: string): boolean {
    return jid.endsWith(GROUP_JID_SUFFIX);
}

export function phonePart(jid: string): string {
    return jid.includes('@') ? jid.split('@')[0] : jid;
}
