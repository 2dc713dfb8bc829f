/**
 * ## FSM Types - Explicit Supersession Rules
 *
 * A small finite state machine describing which lifecycle state a successor
 * record may take when it supersedes a record in a given state.
 */

/**
 * FSM definition for a set of states with allowed transitions.
 *
 * @typeParam TState - Union type of all valid states (string literals)
 */
export interface FSMDefinition<TState extends string> {
  /** State of freshly authored records */
  initial: TState;

  /**
   * Map of state → allowed target states.
   * Empty array = terminal state.
   */
  transitions: Record<TState, readonly TState[]>;
}

export interface FSM<TState extends string> {
  readonly initial: TState;

  canTransition(from: TState, to: TState): boolean;
}
