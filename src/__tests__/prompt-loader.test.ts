import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AIMessage, HumanMessage, SystemMessage } from '@langchain/core/messages';
import {
    loadNameFinderPrompts,
    promptTemplateFromFile,
    promptTemplateFromYaml,
} from '../prompts/prompt-loader.js';
import { PromptFileError } from '../utils/errors.js';
import { getDefaultPromptsDir } from '../utils/paths.js';

const QUESTION_PROMPT = [
    '- [system, you are a helpful bot]',
    "- [user, 'What is the answer to {question}?']",
].join('\n');

describe('Prompt loader', () => {
    describe('shipped prompts', () => {
        it('should load the researcher prompt with two messages', () => {
            const { researcher } = loadNameFinderPrompts(getDefaultPromptsDir());
            expect(researcher.promptMessages).toHaveLength(2);
            expect([...researcher.inputVariables].sort()).toEqual(['format_instructions', 'person']);
        });

        it('should load the locator prompt with one variable', () => {
            const { locator } = loadNameFinderPrompts(getDefaultPromptsDir());
            expect(locator.promptMessages).toHaveLength(2);
            expect(locator.inputVariables).toEqual(['all_docs']);
        });
    });

    describe('promptTemplateFromYaml', () => {
        it('should produce one message per row', () => {
            const template = promptTemplateFromYaml([
                "- [system, 'You summarise {topic}.']",
                '- [user, Start.]',
                '- [assistant, Ready.]',
                '- [user, Go on.]',
            ].join('\n'));
            expect(template.promptMessages).toHaveLength(4);
            expect(template.inputVariables).toEqual(['topic']);
        });

        it('should map roles onto message types', async () => {
            const template = promptTemplateFromYaml([
                '- [System, rules]',
                '- [human, question]',
                '- [ai, answer]',
            ].join('\n'));
            const messages = (await template.invoke({})).toChatMessages();
            expect(messages[0]).toBeInstanceOf(SystemMessage);
            expect(messages[1]).toBeInstanceOf(HumanMessage);
            expect(messages[2]).toBeInstanceOf(AIMessage);
        });

        it('should interpolate supplied variables and ignore unused ones', async () => {
            const template = promptTemplateFromYaml(QUESTION_PROMPT);
            const messages = (await template.invoke({ unused: 'stuff', question: 'the ultimate question' })).toChatMessages();
            expect(messages).toHaveLength(2);
            expect(messages[0]?.content).toBe('you are a helpful bot');
            expect(messages[1]?.content).toBe('What is the answer to the ultimate question?');
        });

        it('should fail at invocation when a placeholder has no value', async () => {
            const template = promptTemplateFromYaml(QUESTION_PROMPT);
            await expect(template.invoke({ unused: 'stuff' })).rejects.toThrow();
        });

        it('should reject an unknown role', () => {
            expect(() => promptTemplateFromYaml('- [robot, beep]')).toThrow(PromptFileError);
        });

        it('should reject rows that are not pairs', () => {
            expect(() => promptTemplateFromYaml('- [system, a, b]')).toThrow(PromptFileError);
            expect(() => promptTemplateFromYaml('system: hello')).toThrow(PromptFileError);
            expect(() => promptTemplateFromYaml('[]')).toThrow(PromptFileError);
        });

        it('should reject invalid YAML', () => {
            expect(() => promptTemplateFromYaml('- [system, "unterminated')).toThrow(PromptFileError);
        });
    });

    describe('promptTemplateFromFile', () => {
        let dir: string;

        beforeEach(() => {
            dir = mkdtempSync(join(tmpdir(), 'wikisearch-prompts-'));
        });

        afterEach(() => {
            rmSync(dir, { recursive: true, force: true });
        });

        it('should load a template from disk', () => {
            const path = join(dir, 'question.yaml');
            writeFileSync(path, QUESTION_PROMPT, 'utf-8');
            expect(promptTemplateFromFile(path).inputVariables).toEqual(['question']);
        });

        it('should name the file when it is missing', () => {
            const path = join(dir, 'missing.yaml');
            expect(() => promptTemplateFromFile(path)).toThrow(`${path}: cannot read prompt file`);
        });
    });
});
