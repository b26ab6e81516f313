export interface KBItem {
  pattern: string; // substring matched against exception tokens and signatures
  fix: string;
  doc?: string; // optional URL or note
}

export interface KnowledgeBasePort {
  lookup(query: string): Promise<KBItem[]>;
}
