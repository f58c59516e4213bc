import { createClient, PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { AppConfig } from './env';
import { GROUP_JID_SUFFIX } from '../types/chat';
import { ConversationRow, MessageRow, NewConversationRow, NewMessageRow } from '../types/rows';
import {
    ConversationPatch,
    ConversationQuery,
    HistoryRepository,
    MessageQuery
} from '../types/repository';

// Сообщения всегда читаем вместе с данными чата
const MESSAGE_SELECT = '*, conversations!inner(contact_identifier, contact_name)';

export class RemoteStoreError extends Error {
    readonly code?: string;

    constructor(operation: string, error: PostgrestError) {
        super(`${operation}: ${error.message}`);
        this.name = 'RemoteStoreError';
        this.code = error.code;
    }
}

export function createSupabase(
    config: Pick<AppConfig, 'supabaseUrl' | 'supabaseKey'>,
    fetchImpl?: typeof fetch
): SupabaseClient {
    return createClient(config.supabaseUrl, config.supabaseKey, {
        auth: {
            persistSession: false,
            autoRefreshToken: false
        },
        global: fetchImpl ? { fetch: fetchImpl } : undefined
    });
}

// Значения внутри or=() берём в кавычки, чтобы запятые и скобки не ломали фильтр
function quoteFilterValue(value: string): string {
    return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function nameOrJidFilter(query: string): string {
    const pattern = quoteFilterValue(`%${query}%`);
    return `contact_name.ilike.${pattern},contact_identifier.ilike.${pattern}`;
}

function rowsOrThrow<T>(operation: string, data: T[] | null, error: PostgrestError | null): T[] {
    if (error) {
        throw new RemoteStoreError(operation, error);
    }
    return data ?? [];
}

export class SupabaseHistoryRepository implements HistoryRepository {
    constructor(
        private readonly supabase: SupabaseClient,
        readonly channel: string = 'whatsapp'
    ) {}

    async findConversation(jid: string): Promise<ConversationRow | null> {
        const { data, error } = await this.supabase
            .from('conversations')
            .select('*')
            .eq('contact_identifier', jid)
            .eq('channel', this.channel)
            .limit(1)
            .returns<ConversationRow[]>();

        return rowsOrThrow('findConversation', data, error)[0] ?? null;
    }

    async findConversationLike(
        fragment: string,
        options: { excludeGroups?: boolean } = {}
    ): Promise<ConversationRow | null> {
        let query = this.supabase
            .from('conversations')
            .select('*')
            .eq('channel', this.channel)
            .ilike('contact_identifier', `%${fragment}%`);

        if (options.excludeGroups) {
            query = query.not('contact_identifier', 'ilike', `%${GROUP_JID_SUFFIX}`);
        }

        const { data, error } = await query.limit(1).returns<ConversationRow[]>();
        return rowsOrThrow('findConversationLike', data, error)[0] ?? null;
    }

    async searchConversations(params: ConversationQuery): Promise<ConversationRow[]> {
        let query = this.supabase
            .from('conversations')
            .select('*')
            .eq('channel', this.channel);

        if (params.query) {
            query = query.or(nameOrJidFilter(params.query));
        }

        const ordered = params.sortBy === 'last_active'
            ? query.order('last_message_at', { ascending: false, nullsFirst: false })
            : query.order('contact_name', { ascending: true, nullsFirst: false });

        const { data, error } = await ordered
            .range(params.offset, params.offset + params.limit - 1)
            .returns<ConversationRow[]>();

        return rowsOrThrow('searchConversations', data, error);
    }

    async searchContacts(search: string, limit: number): Promise<ConversationRow[]> {
        const { data, error } = await this.supabase
            .from('conversations')
            .select('*')
            .eq('channel', this.channel)
            .not('contact_identifier', 'ilike', `%${GROUP_JID_SUFFIX}`)
            .or(nameOrJidFilter(search))
            .order('contact_name', { ascending: true, nullsFirst: false })
            .limit(limit)
            .returns<ConversationRow[]>();

        return rowsOrThrow('searchContacts', data, error);
    }

    async listConversationsByJid(jid: string, offset: number, limit: number): Promise<ConversationRow[]> {
        const { data, error } = await this.supabase
            .from('conversations')
            .select('*')
            .eq('channel', this.channel)
            .eq('contact_identifier', jid)
            .order('last_message_at', { ascending: false })
            .range(offset, offset + limit - 1)
            .returns<ConversationRow[]>();

        return rowsOrThrow('listConversationsByJid', data, error);
    }

    async queryMessages(params: MessageQuery): Promise<MessageRow[]> {
        let query = this.supabase
            .from('messages')
            .select(MESSAGE_SELECT)
            .eq('channel', this.channel);

        if (params.after) {
            query = query.gte('created_at', params.after.toISOString());
        }
        if (params.before) {
            query = query.lte('created_at', params.before.toISOString());
        }
        if (params.sender) {
            query = query.eq('sender', params.sender);
        }
        if (params.chatJid) {
            query = query.eq('conversations.contact_identifier', params.chatJid);
        }
        if (params.query) {
            query = query.ilike('body', `%${params.query}%`);
        }

        const { data, error } = await query
            .order('created_at', { ascending: false })
            .range(params.offset, params.offset + params.limit - 1)
            .returns<MessageRow[]>();

        return rowsOrThrow('queryMessages', data, error);
    }

    async getMessage(id: string): Promise<MessageRow | null> {
        const { data, error } = await this.supabase
            .from('messages')
            .select(MESSAGE_SELECT)
            .eq('id', id)
            .maybeSingle<MessageRow>();

        if (error) {
            throw new RemoteStoreError('getMessage', error);
        }
        return data;
    }

    async messagesBefore(conversationId: string, createdAt: string, limit: number): Promise<MessageRow[]> {
        const { data, error } = await this.supabase
            .from('messages')
            .select(MESSAGE_SELECT)
            .eq('conversation_id', conversationId)
            .lt('created_at', createdAt)
            .order('created_at', { ascending: false })
            .limit(limit)
            .returns<MessageRow[]>();

        return rowsOrThrow('messagesBefore', data, error);
    }

    async messagesAfter(conversationId: string, createdAt: string, limit: number): Promise<MessageRow[]> {
        const { data, error } = await this.supabase
            .from('messages')
            .select(MESSAGE_SELECT)
            .eq('conversation_id', conversationId)
            .gt('created_at', createdAt)
            .order('created_at', { ascending: true })
            .limit(limit)
            .returns<MessageRow[]>();

        return rowsOrThrow('messagesAfter', data, error);
    }

    async latestMessage(conversationId: string): Promise<MessageRow | null> {
        const { data, error } = await this.supabase
            .from('messages')
            .select('*')
            .eq('conversation_id', conversationId)
            .order('created_at', { ascending: false })
            .limit(1)
            .returns<MessageRow[]>();

        return rowsOrThrow('latestMessage', data, error)[0] ?? null;
    }

    async insertConversation(row: NewConversationRow): Promise<string> {
        const { data, error } = await this.supabase
            .from('conversations')
            .insert(row)
            .select('id')
            .single<{ id: string }>();

        if (error) {
            throw new RemoteStoreError('insertConversation', error);
        }
        if (!data) {
            throw new Error('insertConversation: no row returned');
        }
        return data.id;
    }

    async insertMessage(row: NewMessageRow): Promise<string> {
        const { data, error } = await this.supabase
            .from('messages')
            .insert(row)
            .select('id')
            .single<{ id: string }>();

        if (error) {
            throw new RemoteStoreError('insertMessage', error);
        }
        if (!data) {
            throw new Error('insertMessage: no row returned');
        }
        return data.id;
    }

    async updateConversation(id: string, patch: ConversationPatch): Promise<void> {
        const { error } = await this.supabase
            .from('conversations')
            .update(patch)
            .eq('id', id);

        if (error) {
            throw new RemoteStoreError('updateConversation', error);
        }
    }

    async updateConversationName(jid: string, name: string): Promise<void> {
        const { error } = await this.supabase
            .from('conversations')
            .update({ contact_name: name })
            .eq('contact_identifier', jid)
            .eq('channel', this.channel);

        if (error) {
            throw new RemoteStoreError('updateConversationName', error);
        }
    }
}
