/**
 * Types for the LLM client and inference provider
 */

export interface LlmClientConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  embeddingModel?: string;
  timeout?: number;
  maxRetries?: number;
  fetchFn?: typeof fetch;
}

export interface ChatRequest {
  system: string;
  user: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LlmClient {
  readonly model: string;
  readonly embeddingModel: string;
  complete(request: ChatRequest): Promise<string>;
  embed(input: string): Promise<number[]>;
}

/**
 * Document metadata passed to the analysis prompt
 */
export interface AnalysisMetadata {
  filename: string;
  fileType: string;
  fileSize: number;
  modifiedAt: Date | null;
}

/**
 * Document summary line used by the report prompt
 */
export interface ReportDocumentInput {
  filename: string;
  summary: string;
}

/**
 * Critical point line used by the report prompt
 */
export interface ReportPointInput {
  description: string;
  urgency: string;
}

/**
 * Model-backed analysis capability; implementations may be swapped for tests
 */
export interface InferenceProvider {
  readonly modelName: string;
  analyze(content: string, metadata: AnalysisMetadata): Promise<string>;
  /** Resolves null when no embedding could be produced */
  embed(text: string): Promise<number[] | null>;
  summarizeReport(documents: ReportDocumentInput[], points: ReportPointInput[]): Promise<string>;
}

/**
 * Critical point as extracted from text; category and urgency are still raw
 */
export interface CriticalPointDraft {
  description: string;
  category: string;
  urgency: string;
  lastUpdated?: string;
  source: string;
}

export interface CriticalFinding {
  finding: string;
  impact?: string;
  recommendation?: string;
}

export interface ActionItem {
  task: string;
  priority?: string;
  owner?: string;
  timeline?: string;
}

export interface AnalysisResult {
  summary: string;
  criticalPoints: CriticalPointDraft[];
  expiryIndicators: string[];
  recommendations: string[];
  confidenceScore: number;
}

export interface ReportAnalysis {
  executiveSummary: string;
  expiredKnowledgeCount: number;
  criticalFindings: CriticalFinding[];
  recommendations: string[];
  actionItems: ActionItem[];
}
