import { END, START, StateGraph } from '@langchain/langgraph';
import {
    ENTITY_RESEARCHER_NODE,
    NAME_FINDER_NODE,
    createEntityResearcherNode,
    createNameLocatorNode,
    type EntityResearcherDependencies,
    type NameLocatorDependencies,
} from './nodes.js';
import { NameFinderStateAnnotation } from './state.js';

export interface NameFinderDependencies {
    researcher: EntityResearcherDependencies;
    locator: NameLocatorDependencies;
}

/**
 * START → Entity Researcher → Names Finder → END.
 * No branching and no retries; any node failure ends the run.
 */
export function buildNameFinderGraph(deps: NameFinderDependencies) {
    return new StateGraph(NameFinderStateAnnotation)
        .addNode(ENTITY_RESEARCHER_NODE, createEntityResearcherNode(deps.researcher))
        .addNode(NAME_FINDER_NODE, createNameLocatorNode(deps.locator))
        .addEdge(START, ENTITY_RESEARCHER_NODE)
        .addEdge(ENTITY_RESEARCHER_NODE, NAME_FINDER_NODE)
        .addEdge(NAME_FINDER_NODE, END)
        .compile();
}
