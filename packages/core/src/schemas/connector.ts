import { z } from 'zod';

export const STACKEXCHANGE_API_URL = 'https://api.stackexchange.com';
export const STACKEXCHANGE_API_VERSION = '2.2';
export const MAX_QUESTIONS = 100;

export const CacheOptionsSchema = z.object({
  dir: z.string().min(1),
  // Staged entries needed before flush() writes without being forced
  flushThreshold: z.number().int().positive().default(1)
});

export const StackExchangeOptionsSchema = z.object({
  site: z.string().min(1),
  tagged: z.string().min(1),
  token: z.string().min(1),
  maxQuestions: z.number().int().min(1).max(MAX_QUESTIONS).default(MAX_QUESTIONS),
  baseUrl: z.string().url().default(STACKEXCHANGE_API_URL),
  apiVersion: z.string().min(1).default(STACKEXCHANGE_API_VERSION),
  origin: z.string().optional()
});

export const GitBlameOptionsSchema = z.object({
  uri: z.string().min(1),
  gitPath: z.string().min(1),
  rev: z.string().min(1).default('HEAD'),
  origin: z.string().optional()
});

export type CacheOptions = z.input<typeof CacheOptionsSchema>;
export type StackExchangeOptions = z.input<typeof StackExchangeOptionsSchema>;
export type GitBlameOptions = z.input<typeof GitBlameOptionsSchema>;
