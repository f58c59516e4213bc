import test from 'node:test';
import assert from 'node:assert/strict';
import { HistoryStore } from '../src/utils/historyStore';
import { StoreResult } from '../src/types/result';
import { MemoryHistoryRepository } from './support/memoryRepository';

const ALICE = '123@s.whatsapp.net';
const BOB = '456@s.whatsapp.net';
const ME = '999000@s.whatsapp.net';

function value<T>(result: StoreResult<T>): T {
    if (!result.ok) {
        assert.fail(`expected success, got ${result.error.kind}: ${result.error.message}`);
    }
    return result.value;
}

function minute(n: number): string {
    return new Date(Date.UTC(2024, 2, 1, 10, n)).toISOString();
}

// Alice: a1..a5 каждую минуту, Bob: одно сообщение между a3 и a4
function seed() {
    const repo = new MemoryHistoryRepository();
    const alice = repo.addConversation({ contact_identifier: ALICE, contact_name: 'Alice', last_message_at: minute(5) });
    const bob = repo.addConversation({ contact_identifier: BOB, contact_name: 'Bob', last_message_at: minute(3) });

    const a = [1, 2, 3, 4, 5].map(n => repo.addMessage({
        id: `a${n}`,
        conversation_id: alice.id,
        created_at: minute(n),
        direction: n % 2 === 0 ? 'outbound' : 'inbound',
        sender: n % 2 === 0 ? ME : ALICE,
        recipient: n % 2 === 0 ? ALICE : ME,
        body: `alice message ${n}`
    }));
    const b = repo.addMessage({
        id: 'b1',
        conversation_id: bob.id,
        created_at: new Date(Date.UTC(2024, 2, 1, 10, 3, 30)).toISOString(),
        sender: BOB,
        recipient: ME,
        body: 'Lunch tomorrow?'
    });

    return { repo, store: new HistoryStore(repo), alice, bob, a, b };
}

test('sender name resolves by exact jid and falls back to the input', async () => {
    const repo = new MemoryHistoryRepository();
    repo.addConversation({ contact_identifier: ALICE, contact_name: 'Alice' });
    const store = new HistoryStore(repo);

    assert.equal(value(await store.getSenderName(ALICE)), 'Alice');
    assert.equal(value(await store.getSenderName('999@s.whatsapp.net')), '999@s.whatsapp.net');
});

test('sender name falls back to a match on the number', async () => {
    const repo = new MemoryHistoryRepository();
    repo.addConversation({ contact_identifier: '123@c.us', contact_name: 'Alice (old)' });
    const store = new HistoryStore(repo);

    assert.equal(value(await store.getSenderName(ALICE)), 'Alice (old)');
    assert.deepEqual(repo.calls, ['findConversation', 'findConversationLike']);
});

test('sender name without a number is returned as is', async () => {
    const repo = new MemoryHistoryRepository();
    repo.addConversation({ contact_identifier: ALICE, contact_name: 'Alice' });
    const store = new HistoryStore(repo);

    assert.equal(value(await store.getSenderName('@s.whatsapp.net')), '@s.whatsapp.net');
    assert.deepEqual(repo.calls, ['findConversation']);
});

test('sender name skips conversations without a name', async () => {
    const repo = new MemoryHistoryRepository();
    repo.addConversation({ contact_identifier: ALICE });
    const store = new HistoryStore(repo);

    assert.equal(value(await store.getSenderName(ALICE)), ALICE);
});

test('remote failures become remote_unavailable results', async () => {
    const { repo, store } = seed();
    repo.failing.add('findConversation');

    const result = await store.getSenderName(ALICE);
    assert.equal(result.ok, false);
    assert.equal(!result.ok && result.error.kind, 'remote_unavailable');
    assert.equal(!result.ok && result.error.message, 'getSenderName failed: connection refused');
});

test('list messages is newest first and paginated', async () => {
    const { store } = seed();

    const firstPage = value(await store.listMessages({ limit: 2, includeContext: false }));
    assert.deepEqual(firstPage.map(m => m.id), ['a5', 'a4']);

    const secondPage = value(await store.listMessages({ limit: 2, page: 1, includeContext: false }));
    assert.deepEqual(secondPage.map(m => m.id), ['b1', 'a3']);
});

test('list messages applies every filter', async () => {
    const { store } = seed();

    const byText = value(await store.listMessages({ query: 'LUNCH', includeContext: false }));
    assert.deepEqual(byText.map(m => m.id), ['b1']);

    const byChat = value(await store.listMessages({ chatJid: ALICE, includeContext: false }));
    assert.deepEqual(byChat.map(m => m.id), ['a5', 'a4', 'a3', 'a2', 'a1']);

    const bySender = value(await store.listMessages({ senderPhoneNumber: ME, includeContext: false }));
    assert.deepEqual(bySender.map(m => m.id), ['a4', 'a2']);

    const byRange = value(await store.listMessages({
        after: minute(2),
        before: minute(4),
        chatJid: ALICE,
        includeContext: false
    }));
    assert.deepEqual(byRange.map(m => m.id), ['a4', 'a3', 'a2']);
});

test('time bounds without an offset are read as UTC', async () => {
    const { store } = seed();
    const previousTz = process.env.TZ;
    process.env.TZ = 'America/New_York';
    try {
        const afterLocal = value(await store.listMessages({
            after: '2024-03-01T10:04:00',
            includeContext: false
        }));
        assert.deepEqual(afterLocal.map(m => m.id), ['a5', 'a4']);

        const spaced = value(await store.listMessages({
            after: '2024-03-01 10:02',
            before: '2024-03-01T10:03:00',
            chatJid: ALICE,
            includeContext: false
        }));
        assert.deepEqual(spaced.map(m => m.id), ['a3', 'a2']);

        const beforeDay = value(await store.listMessages({ before: '2024-03-01', includeContext: false }));
        assert.deepEqual(beforeDay, []);
        const afterDay = value(await store.listMessages({ after: '2024-03-01', chatJid: BOB, includeContext: false }));
        assert.deepEqual(afterDay.map(m => m.id), ['b1']);
    } finally {
        if (previousTz === undefined) {
            delete process.env.TZ;
        } else {
            process.env.TZ = previousTz;
        }
    }
});

test('list messages rejects bad input', async () => {
    const { store } = seed();

    const badDate = await store.listMessages({ after: 'yesterday' });
    assert.equal(!badDate.ok && badDate.error.kind, 'invalid_input');

    const badLimit = await store.listMessages({ limit: 0 });
    assert.equal(!badLimit.ok && badLimit.error.kind, 'invalid_input');
});

test('list messages expands context windows without repeating messages', async () => {
    const { store } = seed();

    const messages = value(await store.listMessages({ chatJid: ALICE, limit: 2 }));
    // a5 -> [a4, a5], a4 -> [a3, a4, a5]
    assert.deepEqual(messages.map(m => m.id), ['a4', 'a5', 'a3']);
});

test('message context returns chronological windows from the same chat', async () => {
    const { store } = seed();

    const context = value(await store.getMessageContext('a3', 2, 5));
    assert.equal(context.message.id, 'a3');
    assert.deepEqual(context.before.map(m => m.id), ['a1', 'a2']);
    assert.deepEqual(context.after.map(m => m.id), ['a4', 'a5']);

    const all = [...context.before, context.message, ...context.after];
    for (let i = 1; i < all.length; i++) {
        assert.ok(all[i - 1].timestamp.getTime() < all[i].timestamp.getTime());
    }
    assert.ok(all.every(m => m.chatJid === ALICE));
});

test('message context respects the window sizes', async () => {
    const { repo, store } = seed();

    const context = value(await store.getMessageContext('a3', 1, 1));
    assert.deepEqual(context.before.map(m => m.id), ['a2']);
    assert.deepEqual(context.after.map(m => m.id), ['a4']);

    repo.calls.length = 0;
    const bare = value(await store.getMessageContext('a3', 0, 0));
    assert.deepEqual(bare.before, []);
    assert.deepEqual(bare.after, []);
    assert.deepEqual(repo.calls, ['getMessage']);
});

test('message context for an unknown id is not found', async () => {
    const { store } = seed();

    const result = await store.getMessageContext('missing');
    assert.equal(result.ok, false);
    assert.equal(!result.ok && result.error.kind, 'not_found');
    assert.equal(!result.ok && result.error.message, 'Message with ID missing not found');
});

test('list chats orders by last activity with empty chats last', async () => {
    const repo = new MemoryHistoryRepository();
    repo.addConversation({ contact_identifier: 'day1@s.whatsapp.net', last_message_at: '2024-03-01T12:00:00Z' });
    repo.addConversation({ contact_identifier: 'never@s.whatsapp.net' });
    repo.addConversation({ contact_identifier: 'day3@s.whatsapp.net', last_message_at: '2024-03-03T12:00:00Z' });
    repo.addConversation({ contact_identifier: 'day2@s.whatsapp.net', last_message_at: '2024-03-02T12:00:00Z' });
    const store = new HistoryStore(repo);

    const chats = value(await store.listChats({ sortBy: 'last_active', includeLastMessage: false }));
    assert.deepEqual(chats.map(c => c.jid), [
        'day3@s.whatsapp.net',
        'day2@s.whatsapp.net',
        'day1@s.whatsapp.net',
        'never@s.whatsapp.net'
    ]);
    assert.equal(chats[0].last_message_time, '2024-03-03T12:00:00.000Z');
    assert.equal(chats[3].last_message_time, null);
});

test('list chats enriches one chat at a time', async () => {
    const { repo, store } = seed();

    const chats = value(await store.listChats());
    assert.deepEqual(chats, [
        {
            jid: ALICE,
            name: 'Alice',
            last_message_time: minute(5),
            last_message: 'alice message 5',
            last_sender: ALICE,
            last_is_from_me: false
        },
        {
            jid: BOB,
            name: 'Bob',
            last_message_time: minute(3),
            last_message: 'Lunch tomorrow?',
            last_sender: BOB,
            last_is_from_me: false
        }
    ]);
    assert.deepEqual(repo.calls, ['searchConversations', 'latestMessage', 'latestMessage']);
});

test('list chats filters by name or jid and sorts by name', async () => {
    const { store } = seed();

    const byName = value(await store.listChats({ query: 'bo', includeLastMessage: false }));
    assert.deepEqual(byName.map(c => c.name), ['Bob']);

    const byJid = value(await store.listChats({ query: '123', includeLastMessage: false }));
    assert.deepEqual(byJid.map(c => c.name), ['Alice']);

    const sorted = value(await store.listChats({ sortBy: 'name', includeLastMessage: false }));
    assert.deepEqual(sorted.map(c => c.name), ['Alice', 'Bob']);
});

test('search contacts never returns groups and caps results', async () => {
    const repo = new MemoryHistoryRepository();
    repo.addConversation({ contact_identifier: '120363000000@g.us', contact_name: 'Friends group' });
    for (let i = 0; i < 55; i++) {
        repo.addConversation({
            contact_identifier: `49151${String(i).padStart(4, '0')}@s.whatsapp.net`,
            contact_name: `Friend ${String(i).padStart(2, '0')}`
        });
    }
    const store = new HistoryStore(repo);

    const contacts = value(await store.searchContacts('friend'));
    assert.equal(contacts.length, 50);
    assert.ok(contacts.every(c => !c.jid.endsWith('@g.us')));
    assert.deepEqual(contacts[0], {
        phone_number: '491510000',
        name: 'Friend 00',
        jid: '491510000@s.whatsapp.net'
    });
});

test('contact chats and last interaction', async () => {
    const { store } = seed();

    const chats = value(await store.getContactChats(BOB));
    assert.deepEqual(chats, [{ jid: BOB, name: 'Bob', last_message_time: minute(3) }]);

    const last = value(await store.getLastInteraction(ALICE));
    assert.equal(last?.id, 'a5');
    assert.equal(last?.chatName, 'Alice');

    assert.equal(value(await store.getLastInteraction('nobody@s.whatsapp.net')), null);
});

test('last interaction is null for a chat without messages', async () => {
    const repo = new MemoryHistoryRepository();
    repo.addConversation({ contact_identifier: ALICE, contact_name: 'Alice' });
    const store = new HistoryStore(repo);

    assert.equal(value(await store.getLastInteraction(ALICE)), null);
});

test('get chat returns null for unknown chats and enriches on request', async () => {
    const { store } = seed();

    assert.equal(value(await store.getChat('nobody@s.whatsapp.net')), null);
    assert.deepEqual(value(await store.getChat(BOB, false)), { jid: BOB, name: 'Bob', last_message_time: minute(3) });
    assert.equal(value(await store.getChat(BOB))?.last_message, 'Lunch tomorrow?');
});

test('direct chat lookup skips groups', async () => {
    const repo = new MemoryHistoryRepository();
    repo.addConversation({ contact_identifier: '123-1700000000@g.us', contact_name: 'Group' });
    const direct = repo.addConversation({ contact_identifier: ALICE, contact_name: 'Alice' });
    repo.addMessage({ conversation_id: direct.id, created_at: minute(1), body: 'hi', sender: ALICE });
    const store = new HistoryStore(repo);

    const chat = value(await store.getDirectChatByContact('123'));
    assert.equal(chat?.jid, ALICE);
    assert.equal(chat?.last_message, 'hi');
    assert.equal(value(await store.getDirectChatByContact('777')), null);
});

test('saving creates the conversation once and stamps both rows', async () => {
    const repo = new MemoryHistoryRepository();
    const store = new HistoryStore(repo);
    const at = new Date('2024-04-01T08:00:00Z');

    const first = value(await store.saveMessage({
        conversationJid: ALICE,
        sender: ALICE,
        recipient: ME,
        body: 'hi',
        direction: 'inbound',
        externalId: 'wamid-1',
        timestamp: at
    }));
    const second = value(await store.saveMessage({
        conversationJid: ALICE,
        sender: ME,
        recipient: ALICE,
        body: 'photo',
        direction: 'outbound',
        mediaType: 'image',
        timestamp: new Date('2024-04-01T08:01:00Z')
    }));

    assert.equal(repo.conversations.length, 1);
    const conversation = repo.conversations[0];
    assert.equal(conversation.contact_identifier, ALICE);
    assert.equal(conversation.contact_name, null);
    assert.equal(conversation.status, 'active');
    assert.equal(conversation.last_message_at, '2024-04-01T08:01:00.000Z');

    const stored = repo.messages.find(m => m.id === first);
    assert.deepEqual(stored, {
        id: first,
        conversation_id: conversation.id,
        channel: 'whatsapp',
        direction: 'inbound',
        sender: ALICE,
        recipient: ME,
        body: 'hi',
        created_at: '2024-04-01T08:00:00.000Z',
        updated_at: '2024-04-01T08:00:00.000Z',
        topic: 'chat',
        extension: 'text',
        external_id: 'wamid-1',
        metadata: null
    });
    assert.deepEqual(repo.messages.find(m => m.id === second)?.metadata, { media_type: 'image' });
});

test('outbound message round-trips as from me in the recipient chat', async () => {
    const repo = new MemoryHistoryRepository();
    const store = new HistoryStore(repo);

    const id = value(await store.saveMessage({
        conversationJid: BOB,
        sender: ME,
        recipient: BOB,
        body: 'on my way',
        direction: 'outbound'
    }));

    const context = value(await store.getMessageContext(id, 1, 1));
    assert.equal(context.message.isFromMe, true);
    assert.equal(context.message.chatJid, BOB);
    assert.equal(context.message.content, 'on my way');
});

test('saving an empty message writes nothing', async () => {
    const repo = new MemoryHistoryRepository();
    const store = new HistoryStore(repo);

    const result = await store.saveMessage({
        conversationJid: ALICE,
        sender: ALICE,
        recipient: ME,
        body: '',
        direction: 'inbound'
    });
    assert.equal(!result.ok && result.error.kind, 'invalid_input');
    assert.deepEqual(repo.calls, []);

    const media = await store.saveMessage({
        conversationJid: ALICE,
        sender: ALICE,
        recipient: ME,
        body: '',
        direction: 'inbound',
        mediaType: 'sticker'
    });
    assert.equal(media.ok, true);
});

test('a failed insert keeps the created conversation', async () => {
    const repo = new MemoryHistoryRepository();
    repo.failing.add('insertMessage');
    const store = new HistoryStore(repo);

    const result = await store.saveMessage({
        conversationJid: ALICE,
        sender: ALICE,
        recipient: ME,
        body: 'hi',
        direction: 'inbound'
    });
    assert.equal(!result.ok && result.error.kind, 'remote_unavailable');
    assert.equal(repo.conversations.length, 1);
    assert.equal(repo.messages.length, 0);
});

test('contact name updates every matching conversation', async () => {
    const { repo, store } = seed();

    value(await store.updateContactName(ALICE, 'Alice Smith'));
    assert.equal(repo.conversations.find(c => c.contact_identifier === ALICE)?.contact_name, 'Alice Smith');

    const missing = await store.updateContactName('', 'Nobody');
    assert.equal(!missing.ok && missing.error.kind, 'invalid_input');
});

test('store chat creates or renames and moves last activity', async () => {
    const repo = new MemoryHistoryRepository();
    const store = new HistoryStore(repo);

    const id = value(await store.storeChat(ALICE, 'Alice', new Date('2024-05-01T00:00:00Z')));
    assert.deepEqual(repo.conversations, [{
        id,
        channel: 'whatsapp',
        contact_identifier: ALICE,
        contact_name: 'Alice',
        status: 'active',
        last_message_at: '2024-05-01T00:00:00.000Z'
    }]);

    const again = value(await store.storeChat(ALICE, 'Alice B.', new Date('2024-05-02T00:00:00Z')));
    assert.equal(again, id);
    assert.equal(repo.conversations.length, 1);
    assert.equal(repo.conversations[0].contact_name, 'Alice B.');
    assert.equal(repo.conversations[0].last_message_at, '2024-05-02T00:00:00.000Z');
});
