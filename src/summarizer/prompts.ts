export const SYSTEM_PROMPT = 'You are a professional code analyst who writes concise code summaries.';

export function buildSummaryPrompt(filePath: string, content: string): string {
    return `Write a concise summary of the following code file. The summary should cover:
1. The primary purpose of the file
2. Its core classes and functions
3. Notable functionality

File path: ${filePath}
Content:
${content}
`;
}
