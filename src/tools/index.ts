export { registerInsightTools } from "./insights.js";
export { registerLedgerTools } from "./ledger.js";
export { registerResources } from "./resources.js";
export { registerPrompts } from "./prompts.js";
export type { ToolContext } from "./context.js";
