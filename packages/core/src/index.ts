export { Tracer, FileTraceSink, MemoryTraceSink } from './tracer.js';
export type { TraceSink, TracerOptions, FinalizeOptions } from './tracer.js';
export { listTraceFiles, readTraceSnapshots, readLatestSnapshot } from './trace-reader.js';
export type { TraceSnapshots } from './trace-reader.js';
export { executeWithRetry, tryExecuteWithRetry } from './agent-execution.js';
export type { AgentCall, AgentReply, ExecutionOptions } from './agent-execution.js';
export { PromptAgent } from './agent-base.js';
export type { AgentDefinition } from './agent-base.js';
export { AgentManager, AGENT_KEYS } from './agent-manager.js';
export type { AgentInputs, AgentKey, AnyPromptAgent } from './agent-manager.js';
export * from './agents/index.js';
export { assessCritique, extractJson, CRITIQUE_PROMPT, APPROVAL_MARKER } from './critique.js';
export type { CritiqueAssessment } from './critique.js';
export { reflectiveImprove, CRITIC_AGENT, REVISION_PROMPT } from './reflection.js';
export type { ReflectOptions, ReflectResult } from './reflection.js';
export { Workflows } from './workflows.js';
export type { WorkflowOptions, ArticleOptions, SummarizeResult, ArticleResult, SanitizeResult } from './workflows.js';
export {
  loadSmokeCases,
  runSmokeSuite,
  checkOutput,
  smokeCaseSchema,
  DEFAULT_SMOKE_CASES_PATH,
} from './evals.js';
export type { SmokeCase, SmokeCaseResult, SmokeReport } from './evals.js';
export { ConfigManager, deepMerge, CONFIG_FILE_NAMES } from './config-manager.js';
export type { DeepPartial, LoadOptions } from './config-manager.js';
export { createRuntime } from './context.js';
export type { RuntimeContext, RuntimeOverrides } from './context.js';
