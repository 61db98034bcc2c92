import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { mapChatMessagesToStoredMessages, type StoredMessage } from '@langchain/core/messages';
import type { ArticleNames, PersonInfo } from '../types/index.js';
import type { NameFinderAppState } from './state.js';

export const OUTPUT_FILE_NAME = 'agent_out.json';

/**
 * Serialized final state, as written to `agent_out.json`.
 */
export interface AgentOutput {
    target_person: string;
    remaining_steps: number;
    messages: StoredMessage[];
    entity_data: PersonInfo | null;
    article_name_data: ArticleNames | null;
}

export function toAgentOutput(state: NameFinderAppState): AgentOutput {
    return {
        target_person: state.targetPerson,
        remaining_steps: state.remainingSteps,
        messages: mapChatMessagesToStoredMessages(state.messages),
        entity_data: state.entityData,
        article_name_data: state.articleNameData,
    };
}

/**
 * Write the final state to `<workDir>/agent_out.json`. Returns the file path.
 */
export function writeAgentOutput(workDir: string, state: NameFinderAppState): string {
    mkdirSync(workDir, { recursive: true });
    const filePath = join(workDir, OUTPUT_FILE_NAME);
    writeFileSync(filePath, JSON.stringify(toAgentOutput(state), null, 2), 'utf-8');
    return filePath;
}
