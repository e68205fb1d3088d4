// backend/services/docs/src/services/prompts.ts

/** Short synchronous summary used by POST /docs. */
export const FILE_SUMMARY_SYSTEM_PROMPT = `Your job is to provide very high-level documentation of code provided to you.

You will respond in Markdown format, with the following sections:
## Description: (a string less than 100 words)
## Insights: ([string, string, ...] less than 3 strings)

Here is the code:`;

/** One-shot Markdown prompt used by the background file-doc jobs. */
export const FILE_MARKDOWN_SYSTEM_PROMPT = `You are an experienced programmer writing reference documentation for a code file. Reply with Markdown only, following these rules:
1. Start with a level-one heading (#) naming the file.
2. Use subheadings that summarize the ideas in the file rather than listing functions one by one. A function doing breadth-first search over a graph belongs under a heading such as "Graph Traversal".

Example request:
[REQUEST]
Document the following code file titled counter.js

let count = 0;
export function increment() {
  count += 1;
  return count;
}
export function reset() {
  count = 0;
}
[END REQUEST]

Example response:
[RESPONSE]
# Documentation for \`counter.js\`

\`counter.js\` keeps a single module-level counter and exposes two functions to change it.

## Counter State

The module stores the current value in \`count\`, starting at zero. The value is shared by every importer of the module.

## Updating the Counter

- \`increment()\` adds one and returns the new value.
- \`reset()\` sets the value back to zero.
[END RESPONSE]`;

export function fileDocPrompt(fileName: string, content: string): string {
  return `Document the following code file titled ${fileName}\n\n${content}`;
}
