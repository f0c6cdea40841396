/**
 * Hedger Services
 */

export { HedgeConfigStore, type HedgeConfig, type HedgeConfigError } from "./hedge-config";
export { PositionBook, type DeltaRefreshSummary, type PositionBookError } from "./position-book";
export { HedgeEvaluator, type EvaluationResult } from "./hedge-evaluator";
export { HedgeOrderJournal } from "./hedge-order-journal";
export { HedgeOrderExecutor, withTimeout, type ExecutionOutcome } from "./hedge-order-executor";
export { HedgeScheduler, abortableSleep, type SchedulerError, type SchedulerState } from "./hedge-scheduler";
export { parseCommand, type Command, type CommandParseError } from "./command-parser";
export { CommandHandler, type CommandResult } from "./command-handler";
export { OperatorConsole, type ConsoleExit, type PromptInterface } from "./operator-console";
