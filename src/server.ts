import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ConverterConfig } from "./config.js";
import { toToml, type ConvertOptions } from "./convert.js";
import { formatError, unknownParameterError } from "./helpers.js";
import { decodeValue, fromJson } from "./wire.js";

// --- Valid parameter keys per tool (for suggestions) ---

const VALID_KEYS: Record<string, string[]> = {
  to_toml: ["value", "strict"],
  json_to_toml: ["json", "strict"],
};

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

type Converter = (args: Record<string, unknown>, options: ConvertOptions) => string;

// --- Handler wrapper ---
// Centralizes: unknown parameter check, strict-mode resolution, the request's
// cancellation signal and error formatting.

export function wrapHandler(
  toolName: string,
  config: ConverterConfig,
  convert: Converter,
): (args: Record<string, unknown>, extra?: { signal?: AbortSignal }) => Promise<ToolResult> {
  return async (args, extra) => {
    try {
      const validKeys = VALID_KEYS[toolName];
      if (validKeys) {
        const unknownError = unknownParameterError(toolName, args, validKeys);
        if (unknownError) {
          return { content: [{ type: "text", text: `Error: ${unknownError}` }], isError: true };
        }
      }

      const strict = typeof args.strict === "boolean" ? args.strict : config.strict;
      const text = convert(args, { strict, maxDepth: config.maxDepth, signal: extra?.signal });
      return { content: [{ type: "text", text }] };
    } catch (e: unknown) {
      return { content: [{ type: "text", text: `Error: ${formatError(e)}` }], isError: true };
    }
  };
}

export const convertWireValue: Converter = (args, options) => toToml(decodeValue(args.value), options);

export const convertJsonText: Converter = (args, options) => {
  if (typeof args.json !== "string") {
    throw new Error("Parameter 'json' must be a string of JSON text");
  }
  return toToml(fromJson(args.json), options);
};

export function createServer(config: ConverterConfig): McpServer {
  const server = new McpServer({
    name: "value-toml-mcp",
    version: "0.1.0",
  });

  server.registerTool(
    "to_toml",
    {
      description:
        "Convert a pipeline value to TOML text. The root must be a record, a list holding one record, or a string holding TOML. " +
        "Values are given in tagged form, e.g. { \"type\": \"record\", \"cols\": [\"a\"], \"vals\": [{ \"type\": \"int\", \"val\": 1 }] }.",
      inputSchema: z.object({
        value: z.unknown().describe("Tagged pipeline value (type: bool, int, float, string, binary, duration, date, filesize, range, list, record, block, nothing, error, cellpath, custom)"),
        strict: z.boolean().optional().describe("Fail on range, block, nothing and custom values instead of writing placeholders"),
      }).passthrough(),
    },
    wrapHandler("to_toml", config, convertWireValue),
  );

  server.registerTool(
    "json_to_toml",
    {
      description: "Convert JSON text to TOML text. Objects become tables, arrays of objects arrays of tables, null the \"<Nothing>\" placeholder.",
      inputSchema: z.object({
        json: z.string().describe("JSON text whose root is an object or an array of objects"),
        strict: z.boolean().optional().describe("Fail on null instead of writing a placeholder"),
      }).passthrough(),
    },
    wrapHandler("json_to_toml", config, convertJsonText),
  );

  return server;
}
