import { PromptTemplate } from '@langchain/core/prompts';
import type { RetrievedDocument } from '../rag/schemas';
import type { ChatMessage } from './schemas';

// NOTE: templates are f-string style, so no literal braces in the text below.

export const SYSTEM_PROMPT = `
You are a warm, knowledgeable cooking advisor. Keep a friendly, conversational tone,
but state facts only when the retrieved documents support them.
If the documents do not contain enough information, or are unrelated to the question,
say "I don't know" instead of making something up.
Where it helps, add a short cooking tip.
`.trim();

const groundedPrompt = new PromptTemplate({
  template: `
Answer the user's question using ONLY the retrieved documents below.

QUESTION:
<<<{query}>>>

RETRIEVED DOCUMENTS:
<<<{context}>>>

RULES:
1. Work out what the user needs, then answer naturally; combine facts from several documents when useful.
2. Summarize rather than copy the documents verbatim.
3. Cite the documents you used at the end of the sentence, e.g. (Doc-1) or the document title.
4. If the list is empty, insufficient or unrelated, reply "I don't know".
5. If the documents do not mention what the user asked about, say so; never invent details.
`.trim(),
  inputVariables: ['query', 'context'],
});

export const NO_DOCUMENTS =
  '(No documents were retrieved. Reply "I don\'t know".)';

const REWRITER_SYSTEM_PROMPT = `
Rewrite the user's request into a query that works well against a recipe knowledge base.

- Translate non-English input to English first.
- Keep the user's intent exactly, including negative preferences.
- Add concrete recipe attributes when implied (ingredients, cooking method, flavour, dietary needs).
- Drop filler words; keep the query short.
- If the request is not about food or recipes, return it unchanged.

Output format:
<rewrite>the rewritten query</rewrite>
`.trim();

const rewriterPrompt = new PromptTemplate({
  template: `Original user request: {query}`,
  inputVariables: ['query'],
});

function formatDocument(doc: RetrievedDocument, rank: number): string {
  const label = doc.title ?? doc.id;
  const attrs = [`id=${doc.id}`];
  if (doc.score !== null) attrs.push(`score=${doc.score.toFixed(3)}`);
  const snippet = doc.content.trim().replace(/\s*\n+\s*/g, ' ');
  return `[${rank}] ${label} (${attrs.join(', ')})\n${snippet}`;
}

export function formatContext(documents: readonly RetrievedDocument[]): string {
  if (!documents.length) return NO_DOCUMENTS;
  return documents.map((d, i) => formatDocument(d, i + 1)).join('\n\n');
}

/** Grounded system + user messages for the chat upstream. */
export async function buildMessages(
  query: string,
  documents: readonly RetrievedDocument[],
): Promise<ChatMessage[]> {
  const user = await groundedPrompt.format({
    query: query.trim(),
    context: formatContext(documents),
  });
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: user },
  ];
}

export async function buildRewriterMessages(
  query: string,
): Promise<ChatMessage[]> {
  return [
    { role: 'system', content: REWRITER_SYSTEM_PROMPT },
    { role: 'user', content: await rewriterPrompt.format({ query: query.trim() }) },
  ];
}

/** Pulls the query out of `<rewrite>…</rewrite>`; falls back to the whole reply. */
export function extractRewrite(content: string): string {
  const afterOpen = content.split('<rewrite>').pop() ?? content;
  const close = afterOpen.lastIndexOf('</rewrite>');
  return (close === -1 ? afterOpen : afterOpen.slice(0, close)).trim();
}
