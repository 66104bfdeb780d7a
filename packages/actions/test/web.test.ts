import { describe, it, expect, beforeEach } from 'vitest';
import { createWebActions } from '../src/web';
import { createDispatch, FakeBrowser } from './fakes';

describe('web actions', () => {
  let browser: FakeBrowser;
  let t: ReturnType<typeof createDispatch>;

  beforeEach(() => {
    browser = new FakeBrowser();
    t = createDispatch(createWebActions(browser));
  });

  it('opens a URL', async () => {
    const result = await t.dispatch('open', undefined, { url: 'https://portal.example/login' });

    expect(result).toEqual({ outcome: 'success', output: 'https://portal.example/login' });
    expect(browser.calls).toEqual([{ method: 'open', args: ['https://portal.example/login'] }]);
  });

  it('rejects params that break the schema', async () => {
    const result = await t.dispatch('open', undefined, {});

    expect(result.error?.code).toBe('INVALID_PARAMS');
    expect(result.error?.message).toBe(`Invalid params for "open": (params) must have required property 'url'`);
    expect(browser.calls).toEqual([]);
  });

  it('requires a selector for element actions', async () => {
    const result = await t.dispatch('click', undefined, {});

    expect(result.error).toEqual({
      code: 'INVALID_PARAMS',
      message: 'Action "click" requires a selector',
      details: undefined,
    });
  });

  it('fills, selects and uploads', async () => {
    expect((await t.dispatch('fill', '#qty', { value: 42 })).output).toBe('42');
    expect((await t.dispatch('select', '#country', { value: 'NZ' })).output).toEqual(['NZ']);
    expect((await t.dispatch('upload', '#file', { files: 'invoice.pdf' })).output).toEqual(['invoice.pdf']);

    expect(browser.calls).toEqual([
      { method: 'fill', args: ['#qty', '42'] },
      { method: 'select', args: ['#country', ['NZ']] },
      { method: 'upload', args: ['#file', ['invoice.pdf']] },
    ]);
  });

  describe('wait_for', () => {
    it('polls until the element reaches the state', async () => {
      browser.pendingProbes = 2;

      const result = await t.dispatch('wait_for', '#table', { intervalMs: 1 });

      expect(result.outcome).toBe('success');
      expect(browser.methods()).toEqual(['matches', 'matches', 'matches']);
      expect(browser.calls[0].args).toEqual(['#table', 'visible']);
    });

    it('fails with TIMEOUT after its own timeout', async () => {
      browser.pendingProbes = 10_000;

      const result = await t.dispatch('wait_for', '#spinner', { state: 'hidden', timeoutMs: 20, intervalMs: 5 });

      expect(result.error?.code).toBe('TIMEOUT');
      expect(result.error?.message).toBe('Timed out after 20ms waiting for #spinner to be hidden');
    });
  });

  describe('download', () => {
    it('returns the saved file', async () => {
      const result = await t.dispatch('download', '#export', { saveAs: '/tmp/out.csv' });

      expect(result.output).toEqual({ path: '/tmp/out.csv', filename: 'report.csv' });
    });

    it('fails with TIMEOUT and aborts the backend signal', async () => {
      browser.downloadDelayMs = 200;

      const result = await t.dispatch('download', '#export', { timeoutMs: 10 });

      expect(result.error?.code).toBe('TIMEOUT');
      expect(result.error?.message).toBe('Download did not finish within 10ms');
      expect(browser.downloadSignal?.aborted).toBe(true);
    });
  });

  it('evaluates scripts with arguments', async () => {
    const result = await t.dispatch('evaluate', undefined, { script: '(a, b) => a + b', args: [1, 2] });

    expect(result.output).toBe(2);
  });

  it('screenshots an element', async () => {
    const result = await t.dispatch('screenshot', '#chart', {});

    expect(result.output).toBe('iVBORw0KGgo=');
    expect(browser.calls[0].args).toEqual([{ selector: '#chart', path: undefined, fullPage: false }]);
  });
});
