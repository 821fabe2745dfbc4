/**
 * Prompt builders for document analysis and report narratives
 */

import type { AnalysisMetadata, ReportDocumentInput, ReportPointInput } from './types.js';

export const ANALYSIS_SYSTEM_PROMPT =
  'You are an expert knowledge analyst specializing in identifying outdated or expiring information in documents.';

export const REPORT_SYSTEM_PROMPT =
  'You are a senior knowledge management consultant creating executive reports on knowledge expiry risks.';

export const MAX_PROMPT_CONTENT_CHARS = 10000;
export const MAX_REPORT_DOCUMENTS = 20;
export const MAX_REPORT_POINTS = 50;
const MAX_SUMMARY_CHARS = 200;

export function buildAnalysisPrompt(content: string, metadata: AnalysisMetadata): string {
  const modified = metadata.modifiedAt ? metadata.modifiedAt.toISOString() : 'Unknown';

  return `Analyze the following document for knowledge expiry patterns and outdated information.

Document Information:
- Filename: ${metadata.filename || 'Unknown'}
- File Type: ${metadata.fileType || 'Unknown'}
- File Size: ${metadata.fileSize} bytes
- Last Modified: ${modified}

Document Content:
${content.slice(0, MAX_PROMPT_CONTENT_CHARS)}

Please provide a structured analysis in the following format:

**DOCUMENT_SUMMARY:**
[Provide a concise summary of the document's main topics and purpose]

**CRITICAL_POINTS:**
[List specific knowledge points that may expire, each with:
- Point: [Description]
- Category: [Technical, Process, Policy, Regulatory, Product or Organizational]
- Urgency: [Critical/High/Medium/Low]
- Last_Updated: [When this info was likely last relevant, as YYYY-MM-DD if known]]

**EXPIRY_INDICATORS:**
[List specific indicators that suggest knowledge may be outdated:
- Date references
- Technology versions
- Deprecated practices
- Obsolete regulations]

**RECOMMENDATIONS:**
[Specific actions to address potential knowledge expiry]

**CONFIDENCE_SCORE:**
[Provide a confidence score from 0.0 to 1.0 for your analysis]`;
}

export function buildReportPrompt(documents: ReportDocumentInput[], points: ReportPointInput[]): string {
  const docsSummary = documents
    .slice(0, MAX_REPORT_DOCUMENTS)
    .map((doc) => `- ${doc.filename || 'Unknown'}: ${(doc.summary || 'No summary').slice(0, MAX_SUMMARY_CHARS)}`)
    .join('\n');

  const pointsSummary = points
    .slice(0, MAX_REPORT_POINTS)
    .map((point) => `- ${point.description || 'Unknown'}: Urgency ${point.urgency || 'Unknown'}`)
    .join('\n');

  return `Generate a comprehensive knowledge expiry report based on the analyzed documents and critical points.

ANALYZED DOCUMENTS (${documents.length}):
${docsSummary}

CRITICAL KNOWLEDGE POINTS (${points.length}):
${pointsSummary}

Please provide a structured report in the following format:

**EXECUTIVE_SUMMARY:**
[High-level overview of knowledge expiry risks and key findings]

**EXPIRED_KNOWLEDGE_COUNT:**
[Number of items identified as likely expired]

**CRITICAL_FINDINGS:**
[Top 10 most critical findings with:
- Finding: [Description]
- Impact: [Business impact]
- Recommendation: [Specific action]]

**RECOMMENDATIONS:**
[Strategic recommendations for knowledge management]

**ACTION_ITEMS:**
[Specific, actionable items with:
- Task: [Description]
- Priority: [High/Medium/Low]
- Owner: [Suggested role/department]
- Timeline: [Suggested timeframe]]`;
}
