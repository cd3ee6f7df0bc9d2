import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildAnswerMessages, ChatCompletionClient, GroqReasoner } from '../../src/services/reasoning/groq-reasoner';
import { NO_MATCHING_RECORDS } from '../../src/services/reasoning/evidence-formatter';
import { makeRecord, silentLogger } from '../helpers/fakes';

type CreateArgs = Parameters<ChatCompletionClient['chat']['completions']['create']>;

function stubClient(reply: () => Promise<string | null>) {
    const calls: CreateArgs[] = [];
    const client: ChatCompletionClient = {
        chat: {
            completions: {
                create: async (...args: CreateArgs) => {
                    calls.push(args);
                    return { choices: [{ message: { content: await reply() } }] };
                },
            },
        },
    };
    return { client, calls };
}

const EVIDENCE = { totalRecords: 1, records: [{ record: makeRecord({ vendor: 'Acme & Sons', amountMinor: 4200 }) }] };

describe('GroqReasoner', () => {
    it('builds a system prompt and a user prompt from the evidence', () => {
        const [system, user] = buildAnswerMessages('Who billed us $42?', EVIDENCE);

        assert.equal(system.role, 'system');
        assert.ok(system.content.includes(NO_MATCHING_RECORDS));
        assert.ok(!system.content.includes('{{'));
        assert.equal(user.role, 'user');
        assert.ok(user.content.includes('Invoice INV-1 from Acme & Sons dated 2024-01-10 for 42.00 USD.'));
        assert.ok(user.content.includes('**QUESTION:**\nWho billed us $42?'));
    });

    it('calls the model deterministically and returns the trimmed answer', async () => {
        const { client, calls } = stubClient(async () => '  Acme & Sons billed 42.00 USD.  ');
        const reasoner = new GroqReasoner({ logger: silentLogger, apiKey: '', model: 'test-model', maxTokens: 256, client });
        const controller = new AbortController();

        const answer = await reasoner.reason('Who billed us?', EVIDENCE, { signal: controller.signal });

        assert.equal(answer, 'Acme & Sons billed 42.00 USD.');
        assert.equal(reasoner.name, 'groq:test-model');
        assert.equal(calls.length, 1);
        const [body, options] = calls[0];
        assert.equal(body.model, 'test-model');
        assert.equal(body.temperature, 0);
        assert.equal(body.max_tokens, 256);
        assert.equal(body.stream, false);
        assert.equal(body.messages.length, 2);
        assert.equal(options?.maxRetries, 0);
        assert.equal(options?.signal, controller.signal);
    });

    it('treats an empty completion as a failure', async () => {
        const { client } = stubClient(async () => '   ');
        const reasoner = new GroqReasoner({ logger: silentLogger, apiKey: '', model: 'm', maxTokens: 10, client });
        await assert.rejects(reasoner.reason('q', EVIDENCE), { message: 'Groq returned an empty answer' });

        const nullReply = stubClient(async () => null);
        const nullReasoner = new GroqReasoner({ logger: silentLogger, apiKey: '', model: 'm', maxTokens: 10, client: nullReply.client });
        await assert.rejects(nullReasoner.reason('q', EVIDENCE), { message: 'Groq returned an empty answer' });
    });

    it('wraps client errors', async () => {
        const { client } = stubClient(async () => {
            throw new Error('rate limited');
        });
        const reasoner = new GroqReasoner({ logger: silentLogger, apiKey: '', model: 'm', maxTokens: 10, client });
        await assert.rejects(reasoner.reason('q', EVIDENCE), { message: 'Groq API error: rate limited' });
    });

    it('needs an API key when no client is given', () => {
        assert.throws(
            () => new GroqReasoner({ logger: silentLogger, apiKey: '', model: 'm', maxTokens: 10 }),
            /GROQ_API_KEY is required/,
        );
    });
});
