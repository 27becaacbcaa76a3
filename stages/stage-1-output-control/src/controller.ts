/**
 * Output Controller: parse raw LLM content and validate it against a
 * compiled schema. Treats the LLM as untrusted.
 */

import { extractJson } from "./parse.js";
import type {
  OutputController,
  OutputControllerConfig,
  ParseResult,
  SchemaValidator,
} from "./types.js";
import { formatIssues } from "./validate.js";

export function createOutputController(
  config: OutputControllerConfig = {}
): OutputController {
  const stripMarkdown = config.stripMarkdownCodeBlock ?? true;
  const snippetLength = config.rawSnippetLength ?? 500;

  return {
    parseAndValidate<T>(
      content: string,
      validator: SchemaValidator<T>
    ): ParseResult<T> {
      const extract = extractJson(content, stripMarkdown);
      if (!extract.found) {
        return {
          success: false,
          errors: [extract.reason],
          raw: content.slice(0, snippetLength),
        };
      }

      let data: unknown;
      try {
        data = JSON.parse(extract.json);
      } catch (err) {
        const msg = err instanceof Error ? err.message : "JSON parse failed";
        return {
          success: false,
          errors: [msg],
          raw: extract.json.slice(0, snippetLength),
        };
      }

      const validation = validator(data);
      if (!validation.valid) {
        return {
          success: false,
          errors: validation.issues.map((issue) => formatIssues([issue])),
          raw: extract.json.slice(0, snippetLength),
        };
      }

      return { success: true, data: validation.data };
    },
  };
}
