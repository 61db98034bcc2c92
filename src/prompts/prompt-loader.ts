import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { load as loadYaml } from 'js-yaml';
import { z } from 'zod';
import { PromptFileError } from '../utils/errors.js';

/**
 * Message roles accepted in prompt files, mapped onto LangChain's message types.
 */
const ROLE_ALIASES = {
    system: 'system',
    user: 'human',
    human: 'human',
    assistant: 'ai',
    ai: 'ai',
} as const;

type PromptRole = (typeof ROLE_ALIASES)[keyof typeof ROLE_ALIASES];

/**
 * A prompt file is a YAML sequence of `[role, message-text]` pairs.
 */
const PromptFileSchema = z.array(z.tuple([z.string(), z.string()])).min(1);

function toRole(role: string, source: string, row: number): PromptRole {
    const key = role.trim().toLowerCase();
    for (const [alias, mapped] of Object.entries(ROLE_ALIASES)) {
        if (alias === key) return mapped;
    }
    throw new PromptFileError(source, `row ${row}: unknown role "${role}"`);
}

/**
 * Build a chat prompt template from YAML text.
 *
 * Placeholders use f-string syntax (`{person}`) and are resolved when the
 * template is invoked. Variables supplied but not used by any message are
 * ignored; a placeholder left without a value fails at invocation.
 */
export function promptTemplateFromYaml(text: string, source = '<inline>'): ChatPromptTemplate {
    let document: unknown;
    try {
        document = loadYaml(text);
    } catch (error) {
        throw new PromptFileError(source, 'invalid YAML', { cause: error });
    }

    const parsed = PromptFileSchema.safeParse(document);
    if (!parsed.success) {
        throw new PromptFileError(
            source,
            'expected a non-empty list of [role, message] pairs',
            { cause: parsed.error }
        );
    }

    const messages = parsed.data.map(
        ([role, content], i): [PromptRole, string] => [toRole(role, source, i), content]
    );
    return ChatPromptTemplate.fromMessages(messages);
}

/**
 * Build a chat prompt template from a YAML file.
 */
export function promptTemplateFromFile(path: string): ChatPromptTemplate {
    let text: string;
    try {
        text = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new PromptFileError(path, 'cannot read prompt file', { cause: error });
    }
    return promptTemplateFromYaml(text, path);
}

/**
 * The two prompts the name finder graph needs.
 */
export interface NameFinderPrompts {
    researcher: ChatPromptTemplate;
    locator: ChatPromptTemplate;
}

export const RESEARCHER_PROMPT_FILE = 'name_extractor_agent.yaml';
export const LOCATOR_PROMPT_FILE = 'name_scraper_prompt.yaml';

export function loadNameFinderPrompts(promptsDir: string): NameFinderPrompts {
    return {
        researcher: promptTemplateFromFile(join(promptsDir, RESEARCHER_PROMPT_FILE)),
        locator: promptTemplateFromFile(join(promptsDir, LOCATOR_PROMPT_FILE)),
    };
}
