export { Semaphore } from "./Semaphore";
export type { SemaphoreWaitOptions } from "./Semaphore";
export { CoalescingThrottle } from "./CoalescingThrottle";
export { StreamingTextThrottle } from "./StreamingTextThrottle";
export { LevelThrottle } from "./LevelThrottle";
export { BatchThrottle } from "./BatchThrottle";
export { PageNumberThrottle } from "./PageNumberThrottle";
export {
  defaultThrottleConfig,
  defaultStreamingTextConfig,
  defaultLevelThrottleConfig,
  defaultBatchThrottleConfig,
  defaultPageThrottleConfig,
  mergeThrottleConfig,
} from "./ThrottleConfig";
export type {
  ThrottleBaseConfig,
  ThrottleConfig,
  StreamingTextConfig,
  LevelThrottleConfig,
  BatchThrottleConfig,
} from "./ThrottleConfig";
export { TaskScope } from "./TaskScope";
export type { TaskScopeOptions } from "./TaskScope";
export type {
  TaskHandle,
  TaskKind,
  TaskOperation,
  TaskOutcome,
} from "./TaskBag";
export { ScreenScope } from "./ScreenScope";
export type { ScreenScopeOptions } from "./ScreenScope";
export { RequestController, RequestPrefix } from "./RequestController";
export type {
  RequestOperation,
  RequestOptions,
  RequestStats,
} from "./RequestController";
export { PaginationController } from "./PaginationController";
export type {
  PaginationAction,
  PaginationControllerOptions,
} from "./PaginationController";
export { PaginationState } from "./PaginationState";
export { PaginationLoader } from "./PaginationLoader";
export type {
  PageFetcher,
  PageResult,
  PaginationLoaderOptions,
} from "./PaginationLoader";
export { CancellationError, RequestError, isCancellation } from "./errors";
export type { RequestErrorKind } from "./errors";
export { createLogger } from "./log";
export type { Logger } from "./log";
export { monotonicNow, sleep } from "./timing";
export type { Clock } from "./timing";
