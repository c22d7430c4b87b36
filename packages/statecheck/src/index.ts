export { Seed } from './data/seed.js';
export { Size, Range } from './data/size.js';
export { Tree } from './data/tree.js';
export { Gen, type GeneratorFn, type ArrayOptions } from './gen.js';
export { TreeShrinkable, fixed, type Shrinkable } from './shrinkable.js';
export {
  expectEqual,
  type StateMachine,
  type SystemUnderTest,
  type SystemFactory,
  type WeightedCommand,
} from './model.js';
export {
  StatefulError,
  GenerationError,
  SystemUnderTestError,
  PostconditionError,
  ConfigError,
  isRunError,
  type StatefulErrorKind,
  type RunError,
} from './errors.js';
export { Config, type ConfigOptions } from './config.js';
export { chooseCommand, cumulativeWeights } from './command.js';
export { CommandSequence } from './sequence.js';
export { SequenceBuilder } from './builder.js';
export { SequenceShrinker, type ShrinkPhase, type ShrinkOptions } from './search.js';
export type {
  PlanResult,
  PassResult,
  FailResult,
  AbortedResult,
  Failure,
  TestStats,
} from './result.js';
export { formatFailure, formatAborted, formatValue } from './format.js';
export {
  StatefulProperty,
  forAllCommands,
  executePlan,
  type TrialOutcome,
} from './harness.js';
