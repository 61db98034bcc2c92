import { AIMessage, HumanMessage, SystemMessage, ToolMessage, type BaseMessage } from '@langchain/core/messages';
import type { ArticleNames, PersonInfo } from '../types/index.js';

export const ADA: PersonInfo = {
    birth_name: 'Augusta Ada Byron',
    best_known_as: 'Ada Lovelace',
    alternate_names: ['Ada King', 'Countess of Lovelace'],
    best_known_for: 'Writing the first published algorithm intended for a computing machine.',
    is_real: true,
    is_human: true,
    birth_year: 1815,
    birth_month: 12,
    birth_day: 10,
    assigned_gender_at_birth: 'Female',
    gender_identity: 'Female',
    continent_of_origin: 'Europe',
    country_of_origin: 'United Kingdom',
    locality_of_origin: 'London',
};

export const ARTICLE_TEXT = 'Ada Lovelace was the only legitimate child of Lord Byron.';
export const SECOND_ARTICLE_TEXT = 'Lord Byron married Anne Isabella Milbanke in 1815.';

export const ADA_NAMES: ArticleNames = {
    names: [
        { name: 'Lord Byron', relationship: 'father', url: 'https://en.wikipedia.org/wiki/Lord_Byron' },
        { name: 'Anne Isabella Milbanke', relationship: 'mother', url: null },
    ],
};

/**
 * A research trace with two tool calls: one string result, one content-block result.
 */
export function researchTrace(): BaseMessage[] {
    return [
        new SystemMessage('You are a meticulous research librarian.'),
        new HumanMessage('Research this person: Ada Lovelace'),
        new AIMessage({
            content: '',
            tool_calls: [{ id: 'call-1', name: 'get_article', args: { title: 'Ada Lovelace' } }],
        }),
        new ToolMessage({ content: ARTICLE_TEXT, tool_call_id: 'call-1' }),
        new AIMessage({
            content: '',
            tool_calls: [{ id: 'call-2', name: 'get_article', args: { title: 'Lord Byron' } }],
        }),
        new ToolMessage({ content: [{ type: 'text', text: SECOND_ARTICLE_TEXT }], tool_call_id: 'call-2' }),
        new AIMessage('Ada Lovelace was an English mathematician.'),
    ];
}
