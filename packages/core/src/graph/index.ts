export {
    buildDag,
    findStep,
    getStep,
    predecessors,
    successors,
    ancestors,
    nextStep,
} from './dag.js';
export type { StepDefinition, DagEdge, Dag } from './dag.js';
