export {
  RefinementLoop,
  IllegalTransitionError,
  defaultBasePrompt,
  type RefinementState,
  type RefinementLoopOptions,
  type LabelledDocument,
} from './loop';
export {
  IterationBudget,
  InteractiveStopSignal,
  AnyStopSignal,
  type StopSignal,
  type InteractiveStopSignalOptions,
} from './stop-signal';
export { buildPromptHistory, lastIteration, lastPrompt } from './history';
