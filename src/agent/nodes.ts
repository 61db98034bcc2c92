import { GraphRecursionError } from '@langchain/langgraph';
import { isToolMessage, type BaseMessage } from '@langchain/core/messages';
import type { BaseLanguageModelInput } from '@langchain/core/language_models/base';
import { StructuredOutputParser } from '@langchain/core/output_parsers';
import type { ChatPromptTemplate } from '@langchain/core/prompts';
import { ArticleNamesSchema, PersonInfoSchema } from '../types/index.js';
import {
    InvalidStateError,
    NodeOrderError,
    StepBudgetExceededError,
    StructuredOutputError,
} from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { NameFinderAppState, NameFinderStateUpdate } from './state.js';

export const ENTITY_RESEARCHER_NODE = 'Entity Researcher';
export const NAME_FINDER_NODE = 'Names Finder';

/**
 * The tool-using agent behind the researcher node. Satisfied by a compiled
 * `createReactAgent` graph with a `responseFormat`.
 */
export interface ResearchAgent {
    invoke(
        input: { messages: BaseMessage[] },
        options: { recursionLimit: number }
    ): Promise<{ messages: BaseMessage[]; structuredResponse?: unknown }>;
}

export interface EntityResearcherDependencies {
    prompt: ChatPromptTemplate;
    agent: ResearchAgent;
}

/**
 * The tool-less model behind the locator node. Satisfied by a chat model
 * bound with `withStructuredOutput(ArticleNamesSchema)`; its output is
 * validated again by the node.
 */
export interface NameExtractor {
    invoke(input: BaseLanguageModelInput): Promise<unknown>;
}

export interface NameLocatorDependencies {
    prompt: ChatPromptTemplate;
    locator: NameExtractor;
}

export type NameFinderNode = (state: NameFinderAppState) => Promise<NameFinderStateUpdate>;

/**
 * Format instructions describing the PersonInfo shape, interpolated into the
 * researcher prompt as `{format_instructions}`.
 */
export function personFormatInstructions(): string {
    return StructuredOutputParser.fromZodSchema(PersonInfoSchema).getFormatInstructions();
}

function isRecursionLimitError(error: unknown): boolean {
    return error instanceof GraphRecursionError
        || (error instanceof Error && error.name === 'GraphRecursionError');
}

/**
 * Node 1: research the target person with the tool-using agent and parse
 * the agent's structured response into PersonInfo.
 */
export function createEntityResearcherNode(deps: EntityResearcherDependencies): NameFinderNode {
    const formatInstructions = personFormatInstructions();

    return async (state) => {
        const logger = getLogger();
        const person = state.targetPerson.trim();
        if (!person) {
            throw new InvalidStateError(`${ENTITY_RESEARCHER_NODE} requires a non-empty target person`);
        }

        const promptValue = await deps.prompt.invoke({
            person,
            format_instructions: formatInstructions,
        });

        logger.info({ person, stepBudget: state.remainingSteps }, 'Researching entity');

        let result: Awaited<ReturnType<ResearchAgent['invoke']>>;
        try {
            result = await deps.agent.invoke(
                { messages: promptValue.toChatMessages() },
                { recursionLimit: state.remainingSteps }
            );
        } catch (error) {
            if (isRecursionLimitError(error)) {
                throw new StepBudgetExceededError(state.remainingSteps, { cause: error });
            }
            throw error;
        }

        if (result.structuredResponse === undefined || result.structuredResponse === null) {
            throw new StructuredOutputError('PersonInfo', []);
        }
        const parsed = PersonInfoSchema.safeParse(result.structuredResponse);
        if (!parsed.success) {
            throw new StructuredOutputError('PersonInfo', parsed.error.issues, { cause: parsed.error });
        }

        logger.info(
            { bestKnownAs: parsed.data.best_known_as, messages: result.messages.length },
            'Entity research complete'
        );

        return { entityData: parsed.data, messages: result.messages };
    };
}

/**
 * Text content of every tool result in the trace, in trace order.
 * String content is taken as-is; content-block arrays contribute their text blocks.
 */
export function collectToolDocuments(messages: readonly BaseMessage[]): string[] {
    const documents: string[] = [];

    for (const message of messages) {
        if (!isToolMessage(message)) continue;

        const content = message.content;
        if (typeof content === 'string') {
            documents.push(content);
            continue;
        }

        const text = content
            .map((block) => ('text' in block && typeof block.text === 'string' ? block.text : ''))
            .filter((part) => part.length > 0)
            .join('\n');
        documents.push(text);
    }

    return documents;
}

/**
 * Node 2: scan the raw article text the researcher's tools returned and list
 * every person name mentioned in it.
 */
export function createNameLocatorNode(deps: NameLocatorDependencies): NameFinderNode {
    return async (state) => {
        const logger = getLogger();
        if (state.entityData === null) {
            throw new NodeOrderError(NAME_FINDER_NODE, 'entityData');
        }

        const documents = collectToolDocuments(state.messages);
        if (documents.length === 0) {
            logger.warn('No tool output in the message trace; scanning an empty document');
        }
        const allDocs = documents.join('\n');

        logger.info({ documents: documents.length, characters: allDocs.length }, 'Locating names');

        const promptValue = await deps.prompt.invoke({ all_docs: allDocs });
        const raw = await deps.locator.invoke(promptValue);

        const parsed = ArticleNamesSchema.safeParse(raw);
        if (!parsed.success) {
            throw new StructuredOutputError('ArticleNames', parsed.error.issues, { cause: parsed.error });
        }

        logger.info({ names: parsed.data.names.length }, 'Name location complete');

        return { articleNameData: parsed.data };
    };
}
