/**
 * Engine モジュール
 */

export { StateMachine } from "./state-machine.js";
export type { StateMachineOptions } from "./state-machine.js";

export { MachineBuilder, OnEventScope, TransitionScope } from "./builder.js";
export type { MachineCallbacks, StatesBuilder, TransitionBuilder } from "./builder.js";

export { Controller, EventQueue } from "./controller.js";
export { Channel } from "./channel.js";
export type { ReceiveResult } from "./channel.js";
export { EventConsumer } from "./event-consumer.js";
