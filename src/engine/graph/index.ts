export { topologicalSort, topologicalSortWithDepths } from './topological-sort.ts';
export type { CycleError, GraphEdge, TopologicalResult } from './topological-sort.ts';
export { buildTopology, groupFragments } from './topology.ts';
export type { ClassifiedNet, Topology } from './topology.ts';
export { solveWireSizes, initialInterval } from './constraint-solver.ts';
export type { NetConstraint, SolverResult } from './constraint-solver.ts';
export { buildCircuit } from './eval-builder.ts';
export type { ChipEvaluators, CircuitLayout, CircuitProgram } from './eval-builder.ts';
export type { BuildError, BuildErrorKind, CircuitPort, Net, PlacedInterfacePort, PortOwner } from './types.ts';
export { isBuildWarning } from './types.ts';
