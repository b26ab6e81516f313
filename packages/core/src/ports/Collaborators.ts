export interface IssueDraft {
  summary: string;
  description: string;
  issueType: string; // e.g. "Bug"
}

export interface IssueTrackerPort {
  createIssue(draft: IssueDraft): Promise<{ key: string }>;
}

export interface ChatNotifierPort {
  postMessage(text: string, channel?: string): Promise<void>;
}
