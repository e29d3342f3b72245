// Extract a subject identifier and analysis parameters from free-text requests
// Handles exchange codes like "600000.SH", "SZ000001", bare "000001", and tickers like "AAPL"

import type { ParameterValue } from '../types/analysis.js';

const EXCHANGE_PATTERNS: RegExp[] = [
  /\b\d{6}\.(?:SZ|SH)\b/i,   // 000001.SZ, 600000.SH
  /\b(?:SZ|SH)\d{6}\b/i,     // SZ000001, SH600000
  /\b\d{6}\b/,               // 000001, 600000
];

// Upper-case ticker, optionally $-prefixed; matched against the original casing
const TICKER_PATTERN = /(?:^|[^A-Za-z0-9$])\$?([A-Z]{1,5})(?![A-Za-z0-9])/g;

// Capitalised words that read as tickers but almost never are
const TICKER_STOP_WORDS = new Set(['I', 'A', 'AN', 'THE', 'AND', 'OR', 'FOR', 'OF', 'ON', 'IN', 'TO', 'VS', 'ME']);

export function extractSubjectId(query: string): string | null {
  for (const pattern of EXCHANGE_PATTERNS) {
    const match = pattern.exec(query);
    if (match) return match[0].toUpperCase();
  }

  for (const match of query.matchAll(TICKER_PATTERN)) {
    const ticker = match[1];
    if (ticker && !TICKER_STOP_WORDS.has(ticker)) return ticker;
  }

  return null;
}

function mentions(text: string, words: string[]): boolean {
  return words.some(w => new RegExp(`\\b${w}\\b`).test(text));
}

export function extractParameters(query: string): Record<string, ParameterValue> {
  const q = query.toLowerCase();
  const params: Record<string, ParameterValue> = {};

  if (mentions(q, ['weekly', 'week'])) {
    params.timeframe = '1w';
  } else if (mentions(q, ['monthly', 'month'])) {
    params.timeframe = '1M';
  } else {
    params.timeframe = '1d';
  }

  if (mentions(q, ['detailed', 'deep', 'in-depth', 'thorough'])) {
    params.depth = 'detailed';
  } else if (mentions(q, ['summary', 'brief', 'quick'])) {
    params.depth = 'summary';
  } else {
    params.depth = 'normal';
  }

  return params;
}
