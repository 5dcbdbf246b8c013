import { z } from "zod";
import type { DatawiseConfig } from "./types.js";

export const DEFAULT_SYSTEM_PROMPT = [
  "You are a helpful assistant that provides clear and concise answers.",
  "Be friendly, informative, and respectful in your responses.",
  "If you're unsure about something, admit it rather than making up information.",
].join("\n");

const telegramSchema = z.object({
  token: z.string().min(1).optional(),
  maxFileSizeMb: z.number().positive().default(10),
  allowedExtensions: z
    .array(z.string().regex(/^\.[a-z0-9]+$/))
    .min(1)
    .default([".csv", ".json", ".xlsx", ".xls"]),
});

const ollamaSchema = z.object({
  baseUrl: z.string().url().default("http://localhost:11434"),
  binary: z.string().min(1).default("ollama"),
  probeTimeoutMs: z.number().int().positive().default(2_000),
  listTimeoutMs: z.number().int().positive().default(3_000),
  generateTimeoutMs: z.number().int().positive().default(60_000),
  maxPromptChars: z.number().int().min(100).default(4_000),
  maxRetries: z.number().int().min(0).max(10).default(2),
  retryBaseDelayMs: z.number().int().min(0).default(2_000),
});

const cleaningSchema = z.object({
  model: z.string().min(1).default("deepseek-r1:1.5b"),
  maxRows: z.number().int().positive().default(1_000_000),
  maxColumns: z.number().int().positive().default(100),
  sampleRows: z.number().int().min(1).max(50).default(5),
});

const chatSchema = z.object({
  model: z.string().min(1).default("llama3.2:3b"),
  historyLimit: z.number().int().positive().default(20),
  contextBudgetChars: z.number().int().min(200).default(15_000),
  systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const datawiseConfigSchema = z.object({
  telegram: telegramSchema.default({}),
  ollama: ollamaSchema.default({}),
  cleaning: cleaningSchema.default({}),
  chat: chatSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): DatawiseConfig {
  return datawiseConfigSchema.parse(raw);
}
