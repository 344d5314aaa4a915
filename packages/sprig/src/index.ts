// =============================================================================
// Public API
// =============================================================================

// App and mounting
export { App, resolveMountTarget } from "./app.js";
export type { MountOptions, MountTarget } from "./app.js";

// Components
export { Component, ComponentStatus } from "./component.js";
export type { ComponentType } from "./component.js";

// Element creation
export { h, text, list, keyed, component } from "./h.js";
export type { AttributeValue, Child, ElementProps } from "./h.js";

// Virtual nodes and the patch protocol
export { KeyedVNodes } from "./keyed.js";
export type { Markup, VNode } from "./keyed.js";
export { VText } from "./vtext.js";
export { VElement } from "./velement.js";
export type { Attribute, Listener } from "./velement.js";
export { VList } from "./vlist.js";
export { VComponent, ComponentWrapper } from "./vcomponent.js";
export type { ComponentManager } from "./vcomponent.js";
export { DomError } from "./shared.js";
export type { DomPatch, PatchContext, PatchEffect } from "./shared.js";

// Services
export { DocumentHost, DocumentHostLive, documentHostLayer, makeDocumentHost } from "./dom.js";
export type { DocumentHostService } from "./dom.js";
export {
  Scheduler,
  SchedulerLive,
  schedulerLayer,
  makeScheduler,
  makeWakeChannel,
  messageChannelWake,
  microtaskWake,
} from "./scheduler.js";
export type { SchedulerService, WakeChannel } from "./scheduler.js";
export { SprigConfig, SprigConfigLive } from "./config.js";
export type { SprigConfigService, WakeStrategy } from "./config.js";
