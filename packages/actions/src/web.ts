import { setTimeout as sleep } from 'node:timers/promises';
import { ReasonCodes, Result, selectorKey, type ActionHandler } from '@deskpilot/core';
import type { BrowserBackend, ElementState } from './backends';
import { defineAction, withTimeout, TIMED_OUT } from './define-action';

export const DEFAULT_WEB_TIMEOUT_MS = 30_000;

interface OpenParams {
  url: string;
}

interface FillParams {
  value: string | number;
}

interface SelectParams {
  value: string | string[];
}

interface UploadParams {
  files: string | string[];
}

interface WaitForParams {
  state?: ElementState;
  timeoutMs?: number;
  intervalMs?: number;
}

interface DownloadParams {
  saveAs?: string;
  timeoutMs?: number;
}

interface EvaluateParams {
  script: string;
  args?: unknown[];
}

interface ScreenshotParams {
  path?: string;
  fullPage?: boolean;
}

const timeoutSchema = { type: 'integer', exclusiveMinimum: 0, default: DEFAULT_WEB_TIMEOUT_MS } as const;

function toList(value: string | string[]): string[] {
  return Array.isArray(value) ? value : [value];
}

export function createWebActions(browser: BrowserBackend): ActionHandler[] {
  return [
    defineAction<OpenParams>({
      name: 'open',
      title: 'Open page',
      description: 'Navigate the browser to a URL',
      category: 'web',
      paramsSchema: {
        type: 'object',
        required: ['url'],
        properties: { url: { type: 'string', minLength: 1 } },
      },
      async run({ url }) {
        await browser.open(url);
        return Result.success(url);
      },
    }),

    defineAction<Record<string, unknown>>({
      name: 'click',
      title: 'Click element',
      category: 'web',
      requiresSelector: true,
      paramsSchema: { type: 'object' },
      async run(_params, { selector = '' }) {
        await browser.click(selector);
        return Result.success(true);
      },
    }),

    defineAction<FillParams>({
      name: 'fill',
      title: 'Fill input',
      description: 'Replace the value of a text field',
      category: 'web',
      requiresSelector: true,
      paramsSchema: {
        type: 'object',
        required: ['value'],
        properties: { value: { type: ['string', 'number'] } },
      },
      async run({ value }, { selector = '' }) {
        const text = String(value);
        await browser.fill(selector, text);
        return Result.success(text);
      },
    }),

    defineAction<SelectParams>({
      name: 'select',
      title: 'Select option',
      category: 'web',
      requiresSelector: true,
      paramsSchema: {
        type: 'object',
        required: ['value'],
        properties: {
          value: { anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' }, minItems: 1 }] },
        },
      },
      async run({ value }, { selector = '' }) {
        return Result.success(await browser.select(selector, toList(value)));
      },
    }),

    defineAction<UploadParams>({
      name: 'upload',
      title: 'Upload files',
      category: 'web',
      requiresSelector: true,
      paramsSchema: {
        type: 'object',
        required: ['files'],
        properties: {
          files: { anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' }, minItems: 1 }] },
        },
      },
      async run({ files }, { selector = '' }) {
        const list = toList(files);
        await browser.upload(selector, list);
        return Result.success(list);
      },
    }),

    defineAction<WaitForParams>({
      name: 'wait_for',
      title: 'Wait for element',
      description: 'Poll until an element reaches a state, failing with TIMEOUT after timeoutMs',
      category: 'web',
      requiresSelector: true,
      paramsSchema: {
        type: 'object',
        properties: {
          state: { type: 'string', enum: ['visible', 'hidden', 'attached', 'detached'], default: 'visible' },
          timeoutMs: timeoutSchema,
          intervalMs: { type: 'integer', exclusiveMinimum: 0, default: 100 },
        },
      },
      async run(params, { selector = '', signal }) {
        const state = params.state ?? 'visible';
        const timeoutMs = params.timeoutMs ?? DEFAULT_WEB_TIMEOUT_MS;
        const intervalMs = params.intervalMs ?? 100;
        const startedAt = Date.now();

        while (!(await browser.matches(selector, state))) {
          const elapsed = Date.now() - startedAt;
          if (elapsed >= timeoutMs) {
            return Result.failure(
              ReasonCodes.Timeout,
              `Timed out after ${timeoutMs}ms waiting for ${selectorKey(selector)} to be ${state}`,
              { selector, state, timeoutMs }
            );
          }
          if (signal?.aborted) {
            return Result.failure(ReasonCodes.Cancelled, 'Wait cancelled');
          }
          await sleep(Math.min(intervalMs, timeoutMs - elapsed));
        }

        return Result.success({ state, waitedMs: Date.now() - startedAt });
      },
    }),

    defineAction<DownloadParams>({
      name: 'download',
      title: 'Download file',
      description: 'Click a link or button and wait for the download to finish',
      category: 'web',
      requiresSelector: true,
      paramsSchema: {
        type: 'object',
        properties: {
          saveAs: { type: 'string', minLength: 1 },
          timeoutMs: timeoutSchema,
        },
      },
      async run(params, { selector = '', signal }) {
        const timeoutMs = params.timeoutMs ?? DEFAULT_WEB_TIMEOUT_MS;
        const result = await withTimeout(
          inner => browser.download(selector, { saveAs: params.saveAs, signal: inner }),
          timeoutMs,
          signal
        );
        if (result === TIMED_OUT) {
          return Result.failure(ReasonCodes.Timeout, `Download did not finish within ${timeoutMs}ms`, {
            selector,
            timeoutMs,
          });
        }
        return Result.success(result);
      },
    }),

    defineAction<EvaluateParams>({
      name: 'evaluate',
      title: 'Evaluate script',
      description: 'Run JavaScript in the page and return its result',
      category: 'web',
      paramsSchema: {
        type: 'object',
        required: ['script'],
        properties: {
          script: { type: 'string', minLength: 1 },
          args: { type: 'array' },
        },
      },
      async run({ script, args = [] }) {
        return Result.success(await browser.evaluate(script, args));
      },
    }),

    defineAction<ScreenshotParams>({
      name: 'screenshot',
      title: 'Screenshot',
      description: 'Capture the page, or one element when a selector is given',
      category: 'web',
      paramsSchema: {
        type: 'object',
        properties: {
          path: { type: 'string', minLength: 1 },
          fullPage: { type: 'boolean', default: false },
        },
      },
      async run({ path, fullPage = false }, { selector }) {
        return Result.success(await browser.screenshot({ selector, path, fullPage }));
      },
    }),
  ];
}
