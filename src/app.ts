import express, { Express } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { HistoryTools } from './tools/historyTools';
import { MEDIA_TYPES } from './types/chat';
import { StoreOperationError } from './types/result';
import { logger } from './utils/logger';

type ToolOutcome =
    | { ok: true; result: unknown }
    | { ok: false; issues: z.ZodIssue[] };

type ToolRunner = (body: unknown) => Promise<ToolOutcome>;

function defineTool<S extends z.ZodTypeAny>(schema: S, run: (args: z.infer<S>) => Promise<unknown>): ToolRunner {
    return async (body) => {
        const parsed = schema.safeParse(body ?? {});
        if (!parsed.success) {
            return { ok: false, issues: parsed.error.issues };
        }
        return { ok: true, result: await run(parsed.data) };
    };
}

const jid = z.string().min(1);
const limit = z.number().int().positive().default(20);
const page = z.number().int().min(0).default(0);
// Дата без времени или время без смещения читаются как UTC
const timestamp = z.string().date().or(z.string().datetime({ local: true, offset: true }));

export function createTools(tools: HistoryTools): Map<string, ToolRunner> {
    return new Map<string, ToolRunner>([
        ['get_sender_name', defineTool(
            z.object({ sender_jid: jid }),
            args => tools.getSenderName(args.sender_jid)
        )],
        ['list_messages', defineTool(
            z.object({
                after: timestamp.optional(),
                before: timestamp.optional(),
                sender_phone_number: z.string().optional(),
                chat_jid: z.string().optional(),
                query: z.string().optional(),
                limit,
                page,
                include_context: z.boolean().default(true),
                context_before: z.number().int().min(0).default(1),
                context_after: z.number().int().min(0).default(1)
            }),
            args => tools.listMessages({
                after: args.after,
                before: args.before,
                senderPhoneNumber: args.sender_phone_number,
                chatJid: args.chat_jid,
                query: args.query,
                limit: args.limit,
                page: args.page,
                includeContext: args.include_context,
                contextBefore: args.context_before,
                contextAfter: args.context_after
            })
        )],
        ['get_message_context', defineTool(
            z.object({
                message_id: z.string().min(1),
                before: z.number().int().min(0).default(5),
                after: z.number().int().min(0).default(5)
            }),
            args => tools.getMessageContext(args.message_id, args.before, args.after)
        )],
        ['list_chats', defineTool(
            z.object({
                query: z.string().optional(),
                limit,
                page,
                include_last_message: z.boolean().default(true),
                sort_by: z.enum(['last_active', 'name']).default('last_active')
            }),
            args => tools.listChats({
                query: args.query,
                limit: args.limit,
                page: args.page,
                includeLastMessage: args.include_last_message,
                sortBy: args.sort_by
            })
        )],
        ['search_contacts', defineTool(
            z.object({ query: z.string() }),
            args => tools.searchContacts(args.query)
        )],
        ['get_contact_chats', defineTool(
            z.object({ jid, limit, page }),
            args => tools.getContactChats(args.jid, args.limit, args.page)
        )],
        ['get_last_interaction', defineTool(
            z.object({ jid }),
            args => tools.getLastInteraction(args.jid)
        )],
        ['get_chat', defineTool(
            z.object({ chat_jid: jid, include_last_message: z.boolean().default(true) }),
            args => tools.getChat(args.chat_jid, args.include_last_message)
        )],
        ['get_direct_chat_by_contact', defineTool(
            z.object({ sender_phone_number: z.string().min(1) }),
            args => tools.getDirectChatByContact(args.sender_phone_number)
        )],
        ['save_message', defineTool(
            z.object({
                conversation_jid: jid,
                sender: z.string(),
                recipient: z.string(),
                body: z.string(),
                direction: z.enum(['inbound', 'outbound']),
                external_id: z.string().optional(),
                media_type: z.enum(MEDIA_TYPES).optional(),
                timestamp: timestamp.optional()
            }),
            args => tools.saveMessage({
                conversationJid: args.conversation_jid,
                sender: args.sender,
                recipient: args.recipient,
                body: args.body,
                direction: args.direction,
                externalId: args.external_id,
                mediaType: args.media_type,
                timestamp: args.timestamp
            })
        )],
        ['update_contact_name', defineTool(
            z.object({ jid, name: z.string().min(1) }),
            args => tools.updateContactName(args.jid, args.name)
        )],
        ['store_chat', defineTool(
            z.object({ jid, name: z.string().optional(), last_message_time: timestamp }),
            args => tools.storeChat(args.jid, args.name, args.last_message_time)
        )]
    ]);
}

export function createApp(tools: HistoryTools, options: { corsOrigin?: string } = {}): Express {
    const app = express();
    const registry = createTools(tools);

    app.use(cors({
        origin: options.corsOrigin ?? '*',
        methods: ['GET', 'POST']
    }));
    app.use(express.json());

    app.get('/health', (req, res) => {
        res.json({ status: 'ok' });
    });

    // Вызов инструмента: POST /tools/<name> с аргументами в теле
    app.post('/tools/:name', async (req, res) => {
        const runner = registry.get(req.params.name);
        if (!runner) {
            return res.status(404).json({ error: `Unknown tool: ${req.params.name}` });
        }

        try {
            const outcome = await runner(req.body);
            if (!outcome.ok) {
                return res.status(400).json({ error: 'Invalid arguments', details: outcome.issues });
            }
            res.json({ result: outcome.result });
        } catch (error) {
            if (error instanceof StoreOperationError && error.kind === 'not_found') {
                return res.status(404).json({ error: error.message });
            }
            if (error instanceof StoreOperationError && error.kind === 'invalid_input') {
                return res.status(400).json({ error: error.message });
            }
            logger.error(`Error running tool ${req.params.name}:`, error);
            res.status(500).json({ error: 'Tool execution failed' });
        }
    });

    return app;
}
