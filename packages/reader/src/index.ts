export { ReaderSessionStore } from "./stores/ReaderSessionStore";
export type {
  ReaderServices,
  ReaderSessionOptions,
} from "./stores/ReaderSessionStore";
export { WorksFeedStore } from "./stores/WorksFeedStore";
export type {
  Work,
  WorkKind,
  WorksFeedOptions,
  WorksQuery,
} from "./stores/WorksFeedStore";
export { useScreenScope, useTaskScope } from "./hooks/useScreenScope";
export { AiAnswerPanel } from "./components/AiAnswerPanel";
