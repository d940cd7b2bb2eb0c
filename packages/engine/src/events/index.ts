/**
 * @fileoverview Event exports
 *
 * @module @triage/engine/events
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
