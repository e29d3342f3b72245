// Tests for tool-backed workers

import { describe, it, expect, vi } from 'vitest';
import { ToolWorker, createToolWorkers } from '../agents/tool-worker.js';

describe('ToolWorker', () => {
  it('calls its tool with the subject and parameters', async () => {
    const callTool = vi.fn().mockResolvedValue({ recommendation: 'BUY', confidence: 0.6 });
    const worker = new ToolWorker('technical_analysis', callTool);

    const value = await worker.perform('AAPL', { timeframe: '1w' }, new AbortController().signal);

    expect(callTool).toHaveBeenCalledWith('technical_analysis', { subject: 'AAPL', timeframe: '1w' });
    expect(value).toEqual({ recommendation: 'BUY', confidence: 0.6 });
  });

  it('propagates tool failures', async () => {
    const worker = new ToolWorker('x', vi.fn().mockRejectedValue(new Error('tool down')));
    await expect(worker.perform('AAPL', {}, new AbortController().signal)).rejects.toThrow('tool down');
  });

  it('rejects as soon as the signal aborts', async () => {
    const worker = new ToolWorker('slow', () => new Promise<unknown>(() => {}));
    const controller = new AbortController();

    const pending = worker.perform('AAPL', {}, controller.signal);
    controller.abort(new Error('deadline'));

    await expect(pending).rejects.toThrow('deadline');
  });

  it('does not call the tool when already aborted', async () => {
    const callTool = vi.fn();
    const controller = new AbortController();
    controller.abort(new Error('gone'));

    await expect(new ToolWorker('x', callTool).perform('AAPL', {}, controller.signal)).rejects.toThrow('gone');
    expect(callTool).not.toHaveBeenCalled();
  });
});

describe('createToolWorkers', () => {
  it('builds the default technical, fundamental and sentiment workers', () => {
    const workers = createToolWorkers(vi.fn());
    expect(workers.map(w => [w.id, w.worker.toolName])).toEqual([
      ['technical', 'technical_analysis'],
      ['fundamental', 'fundamental_analysis'],
      ['sentiment', 'sentiment_analysis'],
    ]);
  });

  it('accepts custom definitions', () => {
    const workers = createToolWorkers(vi.fn(), [{ id: 'flow', toolName: 'order_flow' }]);
    expect(workers).toHaveLength(1);
    expect(workers[0].worker.toolName).toBe('order_flow');
  });
});
