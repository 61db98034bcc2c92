import { Annotation, MessagesAnnotation } from '@langchain/langgraph';
import type { ArticleNames, PersonInfo } from '../types/index.js';

/**
 * State threaded through the name finder graph.
 *
 * `messages` is append-only (LangGraph's messages reducer). The two output
 * slots are written by exactly one node each and are null until then.
 */
export const NameFinderStateAnnotation = Annotation.Root({
    ...MessagesAnnotation.spec,
    /** Step budget for the researcher's tool-call loop */
    remainingSteps: Annotation<number>(),
    targetPerson: Annotation<string>(),
    entityData: Annotation<PersonInfo | null>(),
    articleNameData: Annotation<ArticleNames | null>(),
});

export type NameFinderAppState = typeof NameFinderStateAnnotation.State;
export type NameFinderStateUpdate = typeof NameFinderStateAnnotation.Update;

/**
 * Initial state for a run: empty history, no outputs yet.
 */
export function createInitialState(targetPerson: string, stepBudget: number): NameFinderAppState {
    return {
        messages: [],
        remainingSteps: stepBudget,
        targetPerson,
        entityData: null,
        articleNameData: null,
    };
}
