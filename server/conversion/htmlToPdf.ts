/**
 * HTML → PDF Conversion Tool
 *
 * Declared to the drafting backend as `convert_html_to_pdf`. The handler
 * posts the HTML to an external rendering service and reports back
 * `{ success, url, filename, error }`; the PDF itself is downloaded later by
 * the artifact resolver.
 */

import { zodToJsonSchema } from "zod-to-json-schema";
import {
  conversionResultSchema,
  htmlToPdfArgsSchema,
  type ConversionResult,
  type HtmlToPdfArgs,
} from "@shared/schema";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { getErrorMessage } from "../utils/errorHandler";
import { logInfo, logWarn } from "../utils/logger";
import { stripTrailingDots } from "../utils/mime";
import type {
  FunctionCallOutcome,
  FunctionToolDefinition,
  FunctionToolHandler,
} from "../drafting/functionTools";

export const HTML_TO_PDF_FUNCTION_NAME = "convert_html_to_pdf";

function toParametersSchema(): Record<string, unknown> {
  // zodToJsonSchema adds a $schema key the function-tool contract does not take
  return Object.fromEntries(
    Object.entries(zodToJsonSchema(htmlToPdfArgsSchema)).filter(([key]) => key !== "$schema"),
  );
}

export const HTML_TO_PDF_TOOL: FunctionToolDefinition = {
  type: "function",
  name: HTML_TO_PDF_FUNCTION_NAME,
  description:
    "Render a complete HTML document to PDF and return a download URL. Call once with the final document.",
  parameters: toParametersSchema(),
  strict: false,
};

export type HtmlToPdfOptions = {
  serviceUrl: string;
  apiKey?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
};

function pdfName(filename: string): string {
  return filename.toLowerCase().endsWith(".pdf") ? filename : `${stripTrailingDots(filename)}.pdf`;
}

export function conversionStatusLine(result: ConversionResult): string {
  return result.success
    ? `PDF Generated: ${result.filename}`
    : `PDF Generation Failed: ${result.error ?? "unknown error"}`;
}

export class HtmlToPdfHandler implements FunctionToolHandler {
  readonly definition = HTML_TO_PDF_TOOL;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(private readonly options: HtmlToPdfOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? TIMEOUT_CONSTANTS.CONVERSION_CALL_MS;
  }

  private authHeaders(): Record<string, string> {
    return this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {};
  }

  /**
   * Downloads from the conversion service's own host carry its credentials;
   * URLs anywhere else (e.g. pre-signed storage links) are fetched bare.
   */
  private downloadHeaders(url: string): Record<string, string> | undefined {
    try {
      const sameHost = new URL(url).host === new URL(this.options.serviceUrl).host;
      return sameHost && this.options.apiKey ? this.authHeaders() : undefined;
    } catch {
      return undefined;
    }
  }

  async convert(args: HtmlToPdfArgs): Promise<ConversionResult> {
    const filename = pdfName(args.filename);
    try {
      const response = await this.fetchImpl(this.options.serviceUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.authHeaders() },
        body: JSON.stringify({ html_content: args.html_content, filename }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        return { success: false, url: null, filename, error: `Conversion service returned ${response.status} ${response.statusText}` };
      }
      const parsed = conversionResultSchema.safeParse(await response.json());
      if (!parsed.success) {
        return { success: false, url: null, filename, error: `Unexpected conversion response: ${getErrorMessage(parsed.error)}` };
      }
      return { ...parsed.data, filename: parsed.data.filename ? pdfName(parsed.data.filename) : filename };
    } catch (err) {
      return { success: false, url: null, filename, error: getErrorMessage(err) };
    }
  }

  async execute(rawArguments: string): Promise<FunctionCallOutcome> {
    let args: HtmlToPdfArgs;
    try {
      args = htmlToPdfArgsSchema.parse(JSON.parse(rawArguments));
    } catch (err) {
      const result: ConversionResult = { success: false, url: null, filename: "", error: `Invalid arguments: ${getErrorMessage(err)}` };
      logWarn(`[HtmlToPdf] ${result.error}`);
      return { success: false, statusLine: conversionStatusLine(result) };
    }

    const result = await this.convert(args);
    if (!result.success || !result.url) {
      const failed = result.success ? { ...result, success: false, error: "Conversion returned no download URL" } : result;
      logWarn(`[HtmlToPdf] Conversion failed`, { error: failed.error ?? undefined });
      return { success: false, statusLine: conversionStatusLine(failed) };
    }

    logInfo(`[HtmlToPdf] Converted ${result.filename}`);
    return {
      success: true,
      statusLine: conversionStatusLine(result),
      download: {
        url: result.url,
        filename: result.filename,
        headers: this.downloadHeaders(result.url),
        mimeType: "application/pdf",
      },
    };
  }
}
