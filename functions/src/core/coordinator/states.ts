// functions/src/core/coordinator/states.ts
// Deterministic state machine of one coordination run (no IO).

export const CoordinatorStates = Object.freeze({
  INIT: "INIT",
  ROUND_PENDING: "ROUND_PENDING",
  DISPATCHING: "DISPATCHING",
  COMMITTING: "COMMITTING",
  CONVERGED: "CONVERGED",
  STALLED: "STALLED",
  TIMED_OUT: "TIMED_OUT",
  CANCELLED: "CANCELLED",
} as const);

export type CoordinatorState = (typeof CoordinatorStates)[keyof typeof CoordinatorStates];

export type CoordinatorEvent = "seeded" | "dispatch" | "commit" | "next_round" | "converge" | "stall" | "time_out" | "cancel";

type Transition = { from: CoordinatorState; event: CoordinatorEvent; to: CoordinatorState };

const transitions: readonly Transition[] = [
  { from: CoordinatorStates.INIT, event: "seeded", to: CoordinatorStates.ROUND_PENDING },
  { from: CoordinatorStates.ROUND_PENDING, event: "dispatch", to: CoordinatorStates.DISPATCHING },
  { from: CoordinatorStates.ROUND_PENDING, event: "converge", to: CoordinatorStates.CONVERGED },
  { from: CoordinatorStates.ROUND_PENDING, event: "stall", to: CoordinatorStates.STALLED },
  { from: CoordinatorStates.ROUND_PENDING, event: "time_out", to: CoordinatorStates.TIMED_OUT },
  { from: CoordinatorStates.ROUND_PENDING, event: "cancel", to: CoordinatorStates.CANCELLED },
  { from: CoordinatorStates.DISPATCHING, event: "commit", to: CoordinatorStates.COMMITTING },
  { from: CoordinatorStates.COMMITTING, event: "next_round", to: CoordinatorStates.ROUND_PENDING },
];

const TERMINAL: readonly CoordinatorState[] = [
  CoordinatorStates.CONVERGED,
  CoordinatorStates.STALLED,
  CoordinatorStates.TIMED_OUT,
  CoordinatorStates.CANCELLED,
];

export function isTerminalState(state: CoordinatorState): boolean {
  return TERMINAL.includes(state);
}

function allowedEvents(state: CoordinatorState): CoordinatorEvent[] {
  return transitions.filter((t) => t.from === state).map((t) => t.event);
}

function findTransition(from: CoordinatorState, event: CoordinatorEvent): Transition | undefined {
  return transitions.find((t) => t.from === from && t.event === event);
}

export type CoordinatorMachineView = {
  state: CoordinatorState;
  context: {
    lastEvent: CoordinatorEvent | null;
    updatedAt: number;
    history: CoordinatorState[];
  };
};

export function createCoordinatorStateMachine({
  initialState = CoordinatorStates.INIT,
  clock = Date.now,
}: { initialState?: CoordinatorState; clock?: () => number } = {}) {
  let state: CoordinatorState = initialState;
  let context: CoordinatorMachineView["context"] = {
    lastEvent: null,
    updatedAt: clock(),
    history: [initialState],
  };

  function view(): CoordinatorMachineView {
    return { state, context: { ...context, history: [...context.history] } };
  }

  function advance(event: CoordinatorEvent): CoordinatorMachineView {
    const transition = findTransition(state, event);
    if (!transition) {
      throw new Error(
        `No transition for state=${state} event=${event}; allowed events: ${allowedEvents(state).join(",") || "none"}`
      );
    }

    state = transition.to;
    context = {
      lastEvent: event,
      updatedAt: clock(),
      history: [...context.history, transition.to],
    };
    return view();
  }

  return { advance, view };
}

export type CoordinatorStateMachine = ReturnType<typeof createCoordinatorStateMachine>;
