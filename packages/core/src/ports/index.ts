export type { LlmTransportPort, LlmCallOptions } from "./LlmTransportPort.js";
export type { KnowledgeBasePort, KBItem } from "./KnowledgeBase.js";
export type { SinkPort } from "./SinkPort.js";
export type { DedupStorePort } from "./DedupStore.js";
export type { IssueTrackerPort, IssueDraft, ChatNotifierPort } from "./Collaborators.js";
