import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LangChainTracer } from '@langchain/core/tracers/tracer_langchain';
import { NameFinderApp, createTracer, toolServerEnv, type ChatModelFactory } from '../agent/app.js';
import { OUTPUT_FILE_NAME } from '../agent/output.js';
import { DEFAULT_CONFIG, type AgentConfig, type ApplicationSecrets } from '../types/index.js';
import { MissingCredentialError, StepBudgetExceededError, StructuredOutputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { getDefaultPromptsDir } from '../utils/paths.js';
import { EnvSecretsProvider } from '../utils/secrets.js';
import { ADA, ADA_NAMES, ARTICLE_TEXT } from './fixtures.js';
import { ScriptedChatModel, reply, structured, toolCall } from './scripted-model.js';
import { linkWikiServer } from './wiki-server.js';

const config: AgentConfig = {
    ...DEFAULT_CONFIG,
    workDir: '/tmp/wikisearch-test',
    promptsDir: getDefaultPromptsDir(),
};

const noSecrets: ApplicationSecrets = {
    tracingApiKey: null,
    llmApiKey: null,
    llmProjectId: null,
    wikiAccessToken: null,
};

describe('NameFinderApp', () => {
    it('should fail before doing anything else when the LLM key is missing', async () => {
        const app = new NameFinderApp(
            { ...config, toolServer: { ...config.toolServer, command: '/nonexistent/wikipedia-mcp' } },
            { secretsProvider: new EnvSecretsProvider({ LANGSMITH_API_KEY: 'test-secret' }) }
        );

        await expect(app.run('Ada Lovelace')).rejects.toBeInstanceOf(MissingCredentialError);
    });

    it('should hand the wiki token to the tool server only when present', () => {
        expect(toolServerEnv(noSecrets)).toEqual({});
        expect(toolServerEnv({ ...noSecrets, wikiAccessToken: 'test-token' })).toEqual({
            WIKIPEDIA_ACCESS_TOKEN: 'test-token',
        });
    });

    it('should trace only when enabled and a key is available', () => {
        const withKey = { ...noSecrets, tracingApiKey: 'test-secret' };

        expect(createTracer(config, noSecrets)).toBeNull();
        expect(createTracer({ ...config, tracing: { enabled: false, project: 'p' } }, withKey)).toBeNull();

        const tracer = createTracer(config, withKey);
        expect(tracer).toBeInstanceOf(LangChainTracer);
        if (tracer instanceof LangChainTracer) {
            expect(tracer.projectName).toBe('wikisearch');
        }
    });
});

describe('NameFinderApp run', () => {
    let workDir: string;

    beforeEach(() => {
        workDir = mkdtempSync(join(tmpdir(), 'wikisearch-app-'));
    });

    afterEach(() => {
        rmSync(workDir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    function researcherModel(): ScriptedChatModel {
        return new ScriptedChatModel([
            () => toolCall('get_article', { title: 'Ada Lovelace' }),
            () => reply('Ada Lovelace was an English mathematician.'),
            structured(ADA),
        ]);
    }

    async function createApp(locator: ScriptedChatModel, researcher = researcherModel(), stepBudget = config.stepBudget) {
        const link = await linkWikiServer();
        const close = vi.spyOn(link.clientTransport, 'close');
        const createModel: ChatModelFactory = (model) =>
            model === DEFAULT_CONFIG.models.researcher ? researcher : locator;
        const app = new NameFinderApp(
            { ...config, workDir, stepBudget },
            {
                secretsProvider: new EnvSecretsProvider({ OPENAI_API_KEY: 'test-secret' }),
                createModel,
                toolSession: { createTransport: link.createTransport },
            }
        );
        return { app, close, researcher };
    }

    it('should research, locate names and write the output file', async () => {
        const locator = new ScriptedChatModel([structured(ADA_NAMES)]);
        const { app, close, researcher } = await createApp(locator);

        const { state, outputPath } = await app.run('Ada Lovelace');

        expect(state.entityData).toEqual(ADA);
        expect(state.articleNameData).toEqual(ADA_NAMES);
        expect(researcher.calls.map((c) => c.boundTools)).toEqual([
            ['get_article', 'get_portrait'],
            ['get_article', 'get_portrait'],
            [expect.any(String)],
        ]);
        expect(locator.calls).toHaveLength(1);
        expect(locator.calls[0]?.messages[1]?.content).toContain(ARTICLE_TEXT);

        expect(outputPath).toBe(join(workDir, OUTPUT_FILE_NAME));
        const written: unknown = JSON.parse(readFileSync(outputPath, 'utf-8'));
        expect(written).toMatchObject({
            target_person: 'Ada Lovelace',
            remaining_steps: DEFAULT_CONFIG.stepBudget,
            entity_data: ADA,
            article_name_data: ADA_NAMES,
        });
        expect(close).toHaveBeenCalled();
    });

    it('should log, rethrow and close the session when a node fails', async () => {
        const error = vi.spyOn(getLogger(), 'error');
        const locator = new ScriptedChatModel([structured({ names: [{ name: 'Lord Byron' }] })]);
        const { app, close } = await createApp(locator);

        await expect(app.run('Ada Lovelace')).rejects.toBeInstanceOf(StructuredOutputError);

        expect(close).toHaveBeenCalled();
        expect(existsSync(join(workDir, OUTPUT_FILE_NAME))).toBe(false);
        expect(error).toHaveBeenCalledWith(
            expect.objectContaining({ person: 'Ada Lovelace' }),
            'Name finder run failed'
        );
    });

    it('should report an exhausted step budget from the research agent', async () => {
        const looping = new ScriptedChatModel(
            Array.from({ length: 10 }, (_, i) => () => toolCall('get_article', { title: 'Ada Lovelace' }, `call-${i}`))
        );
        const locator = new ScriptedChatModel([]);
        const { app, close } = await createApp(locator, looping, 5);

        const error = await app.run('Ada Lovelace').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(StepBudgetExceededError);
        if (error instanceof StepBudgetExceededError) {
            expect(error.budget).toBe(5);
        }
        expect(locator.calls).toHaveLength(0);
        expect(close).toHaveBeenCalled();
    });
});
