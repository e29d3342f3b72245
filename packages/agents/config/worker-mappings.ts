// Default analysis workers: the upstream tool each one calls and its static weight

export const WORKER_TOOLS: Record<string, string> = {
  technical: 'technical_analysis',
  fundamental: 'fundamental_analysis',
  sentiment: 'sentiment_analysis',
};

export const WORKER_DESCRIPTIONS: Record<string, string> = {
  technical: 'Price action, trend and momentum indicators',
  fundamental: 'Financial statements, valuation and profitability',
  sentiment: 'News flow and market sentiment',
};

export const DEFAULT_WORKER_WEIGHTS: Record<string, number> = {
  technical: 0.4,
  fundamental: 0.5,
  sentiment: 0.1,
};

/** Display name for a worker id, e.g. 'technical' -> 'Technical Analyst'. */
export function workerDisplayName(workerId: string): string {
  const words = workerId.split(/[-_\s]+/).filter(Boolean);
  const title = words.map(w => w.charAt(0).toUpperCase() + w.slice(1)).join(' ');
  return `${title} Analyst`;
}
