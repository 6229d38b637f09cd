/*
 * InputManager lifecycle state machine using Robot3
 *
 * uninitialized → ready (on INITIALIZE)
 * ready → ready (on INITIALIZE) rebuilds bindings
 *
 * Updates and queries are only legal in "ready". Using the manager earlier is
 * a programmer error and fails fast.
 */

import {
  createMachine,
  interpret,
  reduce,
  state,
  transition,
} from "robot3";

import type { Machine, MachineState, MachineStates, Service } from "robot3";

export type LifecycleState = "uninitialized" | "ready";

export type LifecycleContext = {
  initializations: number; // How many times INITIALIZE has been applied
};

export type LifecycleEvent = { type: "INITIALIZE" };

type LifecycleEventType = LifecycleEvent["type"];
type LifecycleStatesObject = Record<
  LifecycleState,
  MachineState<LifecycleEventType>
>;
export type LifecycleMachine = Machine<
  LifecycleStatesObject,
  LifecycleContext,
  LifecycleState,
  LifecycleEventType
>;

const countInitialization = (ctx: LifecycleContext): LifecycleContext => ({
  ...ctx,
  initializations: ctx.initializations + 1,
});

export const createLifecycleMachine = (): LifecycleMachine => {
  const states = {
    ready: state(
      transition("INITIALIZE", "ready", reduce(countInitialization)),
    ),
    uninitialized: state(
      transition("INITIALIZE", "ready", reduce(countInitialization)),
    ),
  } as const;

  // robot3's return type widens the event type to `string`; cast back to
  // keep the state/event unions at this module's boundary.
  return createMachine(
    "uninitialized" as const,
    states as unknown as MachineStates<
      LifecycleStatesObject,
      LifecycleEventType
    >,
    (): LifecycleContext => ({ initializations: 0 }),
  ) as unknown as LifecycleMachine;
};

type LifecycleRobotService = Service<LifecycleMachine>;

/** Thin wrapper around the robot3 service. */
export class LifecycleService {
  private service: LifecycleRobotService;
  private currentStateName: LifecycleState = "uninitialized";

  constructor() {
    this.service = interpret(createLifecycleMachine(), (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  initialize(): void {
    const event: LifecycleEvent = { type: "INITIALIZE" };
    this.service.send(event);
  }

  getState(): { state: LifecycleState; context: LifecycleContext } {
    return {
      context: { ...this.service.context },
      state: this.currentStateName,
    };
  }

  isReady(): boolean {
    return this.currentStateName === "ready";
  }

  /** Throws when `operation` is attempted before initialization. */
  assertReady(operation: string): void {
    if (!this.isReady()) {
      throw new Error(`InputManager.${operation} called before initialize()`);
    }
  }
}
