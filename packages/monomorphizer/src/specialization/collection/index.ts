/**
 * Call collection - Public API
 */

export { collectCalls, type CollectableNode } from "./orchestrator.js";
export { collectFromBlock, collectFromStatement } from "./statements.js";
export { collectFromExpression } from "./expressions.js";
