import rehypeSanitize from "rehype-sanitize";
import rehypeStringify from "rehype-stringify";
import remarkGfm from "remark-gfm";
import remarkParse from "remark-parse";
import remarkRehype from "remark-rehype";
import { unified } from "unified";

const processor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype) // raw HTML in the source is dropped here
  .use(rehypeSanitize)
  .use(rehypeStringify);

/** Renders a note body to sanitized HTML. Not cached. */
export async function renderMarkdown(source: string): Promise<string> {
  const file = await processor.process(source);
  return String(file.value);
}
