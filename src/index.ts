export { matchName, describeMatch } from "./resolver/nameMatcher.js";
export { DEFAULT_MATCHER_OPTIONS, DEFAULT_TIERS } from "./resolver/tiers.js";
export type { Candidate, MatchKind, MatchResult, MatcherOptions } from "./resolver/types.js";
export { buildShortcutIndex, buildDirectoryIndex, scanDesktop } from "./resolver/resourceIndex.js";
export { defaultShortcutRoots, type ShortcutRoot } from "./resolver/roots.js";
export { parseDirectives, splitWritePayload } from "./directives/parse.js";
export { DIRECTIVE_KINDS, type Directive, type DirectiveKind } from "./directives/types.js";
export { planFileOperations } from "./fileops/planner.js";
export { executeFileOperations, describePlan } from "./fileops/executor.js";
export type { FileOperationPlan, OperationOutcome, BatchResult, PlanningResult } from "./fileops/types.js";
export { createTaskDispatcher, type TaskDispatcher, type DispatcherDeps } from "./dispatch/dispatcher.js";
export { createOsActions, type OsActions, type OsRequest, type OpenTarget, type ActionResult } from "./os/actions.js";
export { DesktopAssistant } from "./assistant/assistant.js";
export { buildSystemPrompt } from "./assistant/prompts.js";
export { OllamaChatProvider } from "./llm/providers/ollama_chat.js";
export type { LlmProvider, LlmMessage } from "./llm/provider.js";
export { loadSettings, type Settings } from "./config/settings.js";
export { isAffirmative, type OperatorConsole } from "./runtime/console.js";
export type { AssistantEvent, EventSink } from "./runtime/events.js";
