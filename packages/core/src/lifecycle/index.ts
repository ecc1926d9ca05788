export {
  PruneStateMachine,
  type PruneState,
  type StateTransitionEvent,
  type StateChangeListener,
} from "./state-machine.js";
