/*
 * Shape lifecycle state machine (robot3)
 *
 * active → joined (on JOIN)
 * joined is terminal: it declares no transitions, so a second JOIN is ignored
 * by robot3 and produces no event.
 *
 * The JOIN action only queues the JoinPileEvent. The service hands the queued
 * event back after robot3 has switched state, so a subscriber that throws can
 * never leave the machine in "active" with the event already delivered.
 */

import { action, createMachine, interpret, state, transition } from "robot3";

import type { ShapeId } from "../../types/brands";
import type { JoinPileEvent } from "../events";
import type { BlockSnapshot } from "./types";
import type { Machine, MachineState, MachineStates, Service } from "robot3";

export type ShapeLifecycleState = "active" | "joined";

export type ShapeLifecycleContext = {
  shapeId: ShapeId;
};

export type ShapeLifecycleEvent = {
  type: "JOIN";
  blocks: ReadonlyArray<BlockSnapshot>;
};

type ShapeLifecycleEventType = ShapeLifecycleEvent["type"];
type ShapeLifecycleStatesObject = Record<
  ShapeLifecycleState,
  MachineState<ShapeLifecycleEventType>
>;
export type ShapeLifecycleMachine = Machine<
  ShapeLifecycleStatesObject,
  ShapeLifecycleContext,
  ShapeLifecycleState,
  ShapeLifecycleEventType
>;

const createEmitJoinPile =
  (onJoin: (event: JoinPileEvent) => void) =>
  (ctx: ShapeLifecycleContext, event: ShapeLifecycleEvent): void => {
    onJoin({ blocks: event.blocks, kind: "JoinedPile", shapeId: ctx.shapeId });
  };

const createActiveState = (
  onJoin: (event: JoinPileEvent) => void,
): MachineState<ShapeLifecycleEventType> =>
  state(transition("JOIN", "joined", action(createEmitJoinPile(onJoin))));

const createJoinedState = (): MachineState<ShapeLifecycleEventType> =>
  state();

export const createShapeLifecycleMachine = (
  initialContext: ShapeLifecycleContext,
  onJoin: (event: JoinPileEvent) => void,
): ShapeLifecycleMachine => {
  const states = {
    active: createActiveState(onJoin),
    joined: createJoinedState(),
  } as const;

  // robot3 widens the event type to `string`; cast back to keep the
  // state/event names precise at the module boundary.
  return createMachine(
    "active" as const,
    states as unknown as MachineStates<
      ShapeLifecycleStatesObject,
      ShapeLifecycleEventType
    >,
    (_ctx: ShapeLifecycleContext): ShapeLifecycleContext => initialContext,
  ) as unknown as ShapeLifecycleMachine;
};

type ShapeLifecycleRobot = Service<ShapeLifecycleMachine>;

/**
 * Thin wrapper around the robot3 service for one shape.
 */
export class ShapeLifecycleService {
  private readonly service: ShapeLifecycleRobot;
  private pending: Array<JoinPileEvent> = [];
  private currentStateName: ShapeLifecycleState = "active";

  constructor(shapeId: ShapeId) {
    const machine = createShapeLifecycleMachine({ shapeId }, (event) => {
      this.pending.push(event);
    });
    this.service = interpret(machine, (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  get state(): ShapeLifecycleState {
    return this.currentStateName;
  }

  /**
   * Sends JOIN. Returns the event when this call moved the machine from
   * "active" to "joined", otherwise undefined.
   */
  join(blocks: ReadonlyArray<BlockSnapshot>): JoinPileEvent | undefined {
    this.service.send({ blocks, type: "JOIN" });
    const [event] = this.pending;
    this.pending = [];
    return event;
  }
}
