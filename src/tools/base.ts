import { readFileSync } from "fs";
import { z, ZodError } from "zod";
import { formatZodError } from "../llm/errors.js";

export type ToolInput = Record<string, unknown>;
export type ToolData = Record<string, unknown>;

export type ToolResult =
  | { success: true; data: ToolData; toolName: string }
  | { success: false; error: string; toolName: string };

export interface JsonSchemaObject {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
}

export interface CalculatorTool {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
  calcTypes: readonly string[];
  run(input: ToolInput): ToolResult;
}

/** A calculation returns its payload or throws CalculationError for inputs it cannot score. */
export type Calculation = (input: ToolInput) => ToolData;

export class CalculationError extends Error {}

const schemaFile = z.object({
  tools: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      parameters: z.object({
        type: z.literal("object"),
        properties: z.record(z.unknown()),
        required: z.array(z.string()).optional(),
      }),
    })
  ),
});

const SCHEMAS = schemaFile.parse(
  JSON.parse(readFileSync(new URL("../../data/tool-schemas.json", import.meta.url), "utf-8"))
).tools;

/**
 * Build a tool from its calc_type table. Name, description and parameter schema come from
 * data/tool-schemas.json.
 */
export function defineCalculator(name: string, calculations: Record<string, Calculation>): CalculatorTool {
  const schema = SCHEMAS.find((s) => s.name === name);
  if (!schema) throw new Error(`No parameter schema for tool ${name}`);
  const calcTypes = Object.keys(calculations);

  return {
    name,
    description: schema.description,
    parameters: schema.parameters,
    calcTypes,
    run(input: ToolInput): ToolResult {
      const calcType = typeof input.calc_type === "string" ? input.calc_type : "";
      const calculate = Object.hasOwn(calculations, calcType) ? calculations[calcType] : undefined;
      if (!calculate) {
        return {
          success: false,
          error: `Unknown calc_type '${calcType}'. Valid: ${calcTypes.join(", ")}.`,
          toolName: name,
        };
      }
      try {
        return { success: true, data: calculate(input), toolName: name };
      } catch (err) {
        if (err instanceof ZodError) return { success: false, error: formatZodError(err), toolName: name };
        if (err instanceof CalculationError) return { success: false, error: err.message, toolName: name };
        throw err;
      }
    },
  };
}

export function toAnthropicSchema(tool: CalculatorTool) {
  return { name: tool.name, description: tool.description, input_schema: tool.parameters };
}

export function toOpenAISchema(tool: CalculatorTool) {
  return {
    type: "function" as const,
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

// Input fields: absent values take the default, numeric strings are accepted.

export function num(fallback: number) {
  return z.coerce.number().finite().default(fallback);
}

export function int(fallback: number) {
  return num(fallback).transform(Math.trunc);
}

const TRUE_WORDS = new Set(["true", "1", "yes"]);
const FALSE_WORDS = new Set(["false", "0", "no", ""]);

/** Booleans, plus 0/1 and the words true/false/yes/no in any case. */
export function flag() {
  return z.preprocess((value) => {
    if (typeof value === "number") return value !== 0;
    if (typeof value !== "string") return value;
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
    return value;
  }, z.boolean().default(false));
}

export function text(fallback: string) {
  return z.string().default(fallback);
}

export function round(value: number, digits = 0): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Own-property lookup: keys such as "constructor" take the fallback. */
export function lookup<T>(table: Readonly<Record<string, T>>, key: string, fallback: T): T {
  return Object.hasOwn(table, key) ? table[key] : fallback;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** "$12.3M" at a million and above, "$450K" below. */
export function formatDollars(amount: number): string {
  return amount >= 1_000_000 ? `$${(amount / 1_000_000).toFixed(1)}M` : `$${(amount / 1_000).toFixed(0)}K`;
}
