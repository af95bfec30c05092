/**
 * Orchestrator Module
 *
 * Conversation driver, dispatcher and tool registry for the trend analysis agent
 */

export { ConversationDriver, type ConversationOptions, type ConversationOutcome, type Termination } from "./controller.js";
export { ToolDispatcher } from "./dispatcher.js";
export * from "./tools/index.js";
