import type { FSM, FSMDefinition } from "./types.js";

/**
 * Create a type-safe FSM from a definition.
 *
 * @typeParam TState - Union type of all valid states
 */
export function defineFSM<TState extends string>(definition: FSMDefinition<TState>): FSM<TState> {
  return {
    initial: definition.initial,

    canTransition(from: TState, to: TState): boolean {
      return definition.transitions[from].includes(to);
    },
  };
}
