import { ChatMessage } from '../types/chat';
import { logger } from './logger';

export const NO_MESSAGES = 'No messages to display.';

export type NameResolver = (senderJid: string) => Promise<string>;

function pad(num: number): string {
    return num.toString().padStart(2, '0');
}

// YYYY-MM-DD HH:MM:SS в UTC
export function formatTimestamp(date: Date): string {
    return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
        + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

export async function formatMessage(
    message: ChatMessage,
    showChatInfo: boolean,
    resolveName: NameResolver
): Promise<string> {
    let output = `[${formatTimestamp(message.timestamp)}] `;
    if (showChatInfo && message.chatName) {
        output += `Chat: ${message.chatName} `;
    }

    const contentPrefix = message.mediaType
        ? `[${message.mediaType} - Message ID: ${message.id} - Chat JID: ${message.chatJid}] `
        : '';

    try {
        const senderName = message.isFromMe ? 'Me' : await resolveName(message.sender);
        return `${output}From: ${senderName}: ${contentPrefix}${message.content}\n`;
    } catch (error) {
        logger.error('Error formatting message:', error);
        return '';
    }
}

export async function formatMessagesList(
    messages: ChatMessage[],
    showChatInfo: boolean,
    resolveName: NameResolver
): Promise<string> {
    if (messages.length === 0) {
        return NO_MESSAGES;
    }

    let output = '';
    // Имена резолвятся по одному, последовательно
    for (const message of messages) {
        output += await formatMessage(message, showChatInfo, resolveName);
    }
    return output;
}
