import { ChatOpenAI } from '@langchain/openai';
import { createReactAgent } from '@langchain/langgraph/prebuilt';
import { LangChainTracer } from '@langchain/core/tracers/tracer_langchain';
import type { BaseCallbackHandler } from '@langchain/core/callbacks/base';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { Client as LangSmithClient } from 'langsmith';
import type { StructuredToolInterface } from '@langchain/core/tools';
import {
    ArticleNamesSchema,
    PersonInfoSchema,
    type AgentConfig,
    type ApplicationSecrets,
    type SecretsProvider,
} from '../types/index.js';
import { loadNameFinderPrompts, type NameFinderPrompts } from '../prompts/prompt-loader.js';
import { withToolSession, type ToolSessionOptions } from '../tools/tool-session.js';
import { getLogger } from '../utils/logger.js';
import { EnvSecretsProvider, fetchSecrets, presentSecretNames, requireSecret } from '../utils/secrets.js';
import { buildNameFinderGraph, type NameFinderDependencies } from './graph.js';
import type { ResearchAgent } from './nodes.js';
import { writeAgentOutput } from './output.js';
import { createInitialState, type NameFinderAppState } from './state.js';

/**
 * Builds the chat model for one node from its configured model name.
 */
export type ChatModelFactory = (model: string, secrets: ApplicationSecrets) => BaseChatModel;

export interface NameFinderAppOptions {
    secretsProvider?: SecretsProvider;
    createModel?: ChatModelFactory;
    toolSession?: ToolSessionOptions;
}

export const openAIChatModel: ChatModelFactory = (model, secrets) =>
    new ChatOpenAI({
        model,
        apiKey: requireSecret(secrets, 'llmApiKey'),
        configuration: secrets.llmProjectId ? { project: secrets.llmProjectId } : undefined,
    });

export interface NameFinderRunResult {
    state: NameFinderAppState;
    outputPath: string;
}

/**
 * Environment handed to the tool server process.
 */
export function toolServerEnv(secrets: ApplicationSecrets): Record<string, string> {
    return secrets.wikiAccessToken ? { WIKIPEDIA_ACCESS_TOKEN: secrets.wikiAccessToken } : {};
}

/**
 * LangSmith tracer, when tracing is enabled and a key is available.
 */
export function createTracer(config: AgentConfig, secrets: ApplicationSecrets): BaseCallbackHandler | null {
    if (!config.tracing.enabled || secrets.tracingApiKey === null) {
        return null;
    }
    return new LangChainTracer({
        projectName: config.tracing.project,
        client: new LangSmithClient({ apiKey: secrets.tracingApiKey }),
    });
}

/**
 * The main application harness.
 *
 * Fetches secrets, configures the models and tracing, opens the Wikipedia
 * tool session, runs the name finder graph once, and writes the final state
 * to the working directory.
 */
export class NameFinderApp {
    private readonly secretsProvider: SecretsProvider;
    private readonly createModel: ChatModelFactory;
    private readonly toolSessionOptions: ToolSessionOptions;

    constructor(
        private readonly config: AgentConfig,
        options: NameFinderAppOptions = {}
    ) {
        this.secretsProvider = options.secretsProvider ?? new EnvSecretsProvider();
        this.createModel = options.createModel ?? openAIChatModel;
        this.toolSessionOptions = options.toolSession ?? {};
    }

    private createDependencies(
        secrets: ApplicationSecrets,
        prompts: NameFinderPrompts,
        tools: StructuredToolInterface[]
    ): NameFinderDependencies {
        const reactAgent = createReactAgent({
            llm: this.createModel(this.config.models.researcher, secrets),
            tools,
            responseFormat: PersonInfoSchema,
            name: 'PersonResearcher',
        });
        const agent: ResearchAgent = {
            invoke: async (input, options) => {
                const result = await reactAgent.invoke(input, options);
                return { messages: result.messages, structuredResponse: result.structuredResponse };
            },
        };

        const locator = this.createModel(this.config.models.locator, secrets).withStructuredOutput(
            ArticleNamesSchema,
            { name: 'ArticleNames' }
        );

        return {
            researcher: { prompt: prompts.researcher, agent },
            locator: { prompt: prompts.locator, locator },
        };
    }

    async run(targetPerson: string): Promise<NameFinderRunResult> {
        const logger = getLogger();

        try {
            const secrets = await fetchSecrets(this.secretsProvider);
            requireSecret(secrets, 'llmApiKey');
            logger.debug({ keys: presentSecretNames(secrets) }, 'Fetched keys');

            const prompts = loadNameFinderPrompts(this.config.promptsDir);
            const tracer = createTracer(this.config, secrets);
            logger.info({ person: targetPerson, tracing: tracer !== null }, 'Starting Wikisearch name finder agent');

            const state = await withToolSession(this.config.toolServer, toolServerEnv(secrets), async (session) => {
                const tools = await session.loadAgentTools();
                logger.debug({ tools: tools.map((t) => t.name) }, 'Got tools');

                const graph = buildNameFinderGraph(this.createDependencies(secrets, prompts, tools));
                return graph.invoke(createInitialState(targetPerson, this.config.stepBudget), {
                    callbacks: tracer ? [tracer] : undefined,
                });
            }, this.toolSessionOptions);

            const last = state.messages.at(-1);
            logger.info({ result: last?.content }, 'Agent final state');
            logger.info({ structuredResponse: state.entityData }, 'JSON entity result');

            const outputPath = writeAgentOutput(this.config.workDir, state);
            logger.info({ outputPath, names: state.articleNameData?.names.length ?? 0 }, 'Wrote agent output');

            return { state, outputPath };
        } catch (error) {
            logger.error({ err: error, person: targetPerson }, 'Name finder run failed');
            throw error;
        }
    }
}
