import * as cheerio from "cheerio";
import { err, ok, type Result } from "neverthrow";
import type { ExtractionFailure } from "../../core/entities/appError";
import type { DocumentDraft, ProductType } from "../../core/entities/document";
import type { ExtractorPort } from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";
import type { HttpTextClient } from "../http/httpTextClient";

const boilerplateSelectors = [
  "script",
  "style",
  "noscript",
  "template",
  "nav",
  "header",
  "footer",
];

const blockSelector =
  "br, p, div, li, dt, dd, h1, h2, h3, h4, h5, h6, td, th, section, article";

const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

export type ParsedPage = {
  title: string;
  headings: string[];
  bodyText: string;
};

/**
 * Parses markup into title, document-ordered headings and whitespace-normalized body text.
 * Deterministic for a given input.
 */
export const parseDocumentHtml = (html: string): ParsedPage => {
  const $ = cheerio.load(html);

  const title =
    collapseWhitespace($("title").first().text()) ||
    collapseWhitespace($("h1").first().text());

  for (const selector of boilerplateSelectors) {
    $(selector).remove();
  }

  const headings: string[] = [];
  $("h1, h2, h3, h4, h5, h6").each((_, element) => {
    const heading = collapseWhitespace($(element).text());
    if (heading.length > 0) {
      headings.push(heading);
    }
  });

  const body = $("body");
  // Block boundaries would otherwise glue adjacent words together.
  body.find(blockSelector).each((_, element) => {
    $(element).append(" ");
  });
  const bodyText = collapseWhitespace(body.text());

  return { title, headings, bodyText };
};

export type HtmlDocumentExtractorOptions = {
  timeoutMs: number;
  userAgent: string;
};

/**
 * Fetches one documentation page and turns it into a document draft for the expected product type.
 */
export class HtmlDocumentExtractor implements ExtractorPort {
  constructor(
    private readonly http: HttpTextClient,
    private readonly clock: ClockPort,
    private readonly options: HtmlDocumentExtractorOptions,
  ) {}

  async extract(
    url: string,
    expectedProductType: ProductType,
  ): Promise<Result<DocumentDraft, ExtractionFailure>> {
    const response = await this.http.getText({
      url,
      timeoutMs: this.options.timeoutMs,
      headers: {
        "user-agent": this.options.userAgent,
        accept: "text/html,application/xhtml+xml",
      },
    });

    if (response.isErr()) {
      return err({
        kind: "fetch",
        url,
        productType: expectedProductType,
        cause: response.error,
      });
    }

    if (response.value.body.trim().length === 0) {
      return err({ kind: "empty_content", url, productType: expectedProductType });
    }

    const page = parseDocumentHtml(response.value.body);
    if (page.bodyText.length === 0) {
      return err({ kind: "empty_content", url, productType: expectedProductType });
    }

    return ok({
      productType: expectedProductType,
      sourceUrl: url,
      title: page.title,
      headings: page.headings,
      bodyText: page.bodyText,
      fetchedAt: this.clock.now(),
    });
  }
}
