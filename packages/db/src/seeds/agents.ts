import type { Agent } from '@groundwork/shared'

// Two agents per pipeline role; the registry starts with all of them available.
export const DEFAULT_AGENTS: Agent[] = [
    {
        id: 'planner_a',
        type: 'planner',
        name: 'Planner A',
        version: 'v1.0',
        status: 'available',
        capabilities: ['task_decomposition', 'planning'],
        description: 'Primary planner agent for task decomposition',
    },
    {
        id: 'planner_b',
        type: 'planner',
        name: 'Planner B',
        version: 'v1.1',
        status: 'available',
        capabilities: ['task_decomposition', 'planning', 'fast_planning'],
        description: 'Fast backup planner agent',
    },
    {
        id: 'researcher_a',
        type: 'researcher',
        name: 'Researcher A',
        version: 'v1.0',
        status: 'available',
        capabilities: ['vector_search', 'document_retrieval'],
        description: 'Knowledge-base researcher agent',
    },
    {
        id: 'researcher_b',
        type: 'researcher',
        name: 'Researcher B',
        version: 'v1.0',
        status: 'available',
        capabilities: ['information_retrieval', 'evidence_extraction'],
        description: 'Evidence-extraction researcher agent',
    },
    {
        id: 'reasoner_a',
        type: 'reasoner',
        name: 'Reasoner A',
        version: 'v1.0',
        status: 'available',
        capabilities: ['deep_analysis', 'chain_of_thought'],
        description: 'Reasoner for complex multi-step analysis',
    },
    {
        id: 'reasoner_b',
        type: 'reasoner',
        name: 'Reasoner B',
        version: 'v1.0',
        status: 'available',
        capabilities: ['quick_analysis', 'pattern_matching'],
        description: 'Reasoner for fast analysis',
    },
    {
        id: 'synthesizer_a',
        type: 'synthesizer',
        name: 'Synthesizer A',
        version: 'v1.0',
        status: 'available',
        capabilities: ['comprehensive_response', 'citation'],
        description: 'Synthesizer for detailed, cited responses',
    },
    {
        id: 'synthesizer_b',
        type: 'synthesizer',
        name: 'Synthesizer B',
        version: 'v1.0',
        status: 'available',
        capabilities: ['concise_writing', 'summary'],
        description: 'Synthesizer for brief responses',
    },
]
