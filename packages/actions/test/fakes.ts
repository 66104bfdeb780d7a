import {
  ActionDispatcher,
  DefaultActionRegistry,
  ExecutionContext,
  type ActionHandler,
  type ActionResult,
  type Selector,
} from '@deskpilot/core';
import type {
  BrowserBackend,
  DesktopBackend,
  DownloadResult,
  ElementState,
  ImageMatch,
  ImageMatchOptions,
  ImageMatcher,
  MouseButton,
  Point,
  Region,
  TableBackend,
  TableRow,
} from '../src/backends';

export class FakeBrowser implements BrowserBackend {
  readonly calls: Array<{ method: string; args: unknown[] }> = [];
  /** Number of `matches` probes that return false before one returns true */
  pendingProbes = 0;
  downloadDelayMs = 0;
  downloadSignal?: AbortSignal;

  async open(url: string): Promise<void> {
    this.calls.push({ method: 'open', args: [url] });
  }

  async click(selector: Selector): Promise<void> {
    this.calls.push({ method: 'click', args: [selector] });
  }

  async fill(selector: Selector, value: string): Promise<void> {
    this.calls.push({ method: 'fill', args: [selector, value] });
  }

  async select(selector: Selector, values: string[]): Promise<string[]> {
    this.calls.push({ method: 'select', args: [selector, values] });
    return values;
  }

  async upload(selector: Selector, files: string[]): Promise<void> {
    this.calls.push({ method: 'upload', args: [selector, files] });
  }

  async matches(selector: Selector, state: ElementState): Promise<boolean> {
    this.calls.push({ method: 'matches', args: [selector, state] });
    if (this.pendingProbes > 0) {
      this.pendingProbes--;
      return false;
    }
    return true;
  }

  download(selector: Selector, options: { saveAs?: string; signal: AbortSignal }): Promise<DownloadResult> {
    this.calls.push({ method: 'download', args: [selector, options.saveAs] });
    this.downloadSignal = options.signal;
    const path = options.saveAs ?? '/tmp/report.csv';
    return new Promise(resolve => {
      setTimeout(() => resolve({ path, filename: 'report.csv' }), this.downloadDelayMs);
    });
  }

  async evaluate(script: string, args: readonly unknown[]): Promise<unknown> {
    this.calls.push({ method: 'evaluate', args: [script, args] });
    return args.length;
  }

  async screenshot(options: { selector?: Selector; path?: string; fullPage: boolean }): Promise<string> {
    this.calls.push({ method: 'screenshot', args: [options] });
    return options.path ?? 'iVBORw0KGgo=';
  }

  methods(): string[] {
    return this.calls.map(c => c.method);
  }
}

export class FakeDesktop implements DesktopBackend {
  readonly clicks: Array<{ point: Point; button: MouseButton; clicks: number }> = [];
  readonly captures: Region[] = [];
  pointer: Point = { x: 0, y: 0 };
  elements = new Map<string, Region>();
  windows = new Map<string, Region>();
  dpi = 96;

  async pointerPosition(): Promise<Point> {
    return { ...this.pointer };
  }

  async click(point: Point, options: { button: MouseButton; clicks: number }): Promise<void> {
    this.clicks.push({ point, ...options });
  }

  async capture(region: Region): Promise<string> {
    this.captures.push(region);
    return `capture:${region.x},${region.y},${region.width}x${region.height}`;
  }

  async elementBounds(selector: Selector): Promise<Region | null> {
    return typeof selector === 'string' ? this.elements.get(selector) ?? null : null;
  }

  async windowBounds(selector: Selector): Promise<Region | null> {
    return typeof selector === 'string' ? this.windows.get(selector) ?? null : null;
  }

  async screenDpi(): Promise<number> {
    return this.dpi;
  }
}

export class FakeImageMatcher implements ImageMatcher {
  readonly searches: Array<{ template: string; options: ImageMatchOptions }> = [];

  constructor(private readonly matches: Record<string, ImageMatch> = {}) {}

  async find(template: string, options: ImageMatchOptions): Promise<ImageMatch | null> {
    this.searches.push({ template, options });
    return this.matches[template] ?? null;
  }
}

export class FakeTables implements TableBackend {
  readonly selected: Array<{ selector: Selector; index: number }> = [];

  constructor(private readonly tables: Record<string, TableRow[]>) {}

  async rows(selector: Selector): Promise<TableRow[]> {
    return typeof selector === 'string' ? this.tables[selector] ?? [] : [];
  }

  async selectRow(selector: Selector, index: number): Promise<void> {
    this.selected.push({ selector, index });
  }
}

/** Dispatch through a registry holding `actions` */
export function createDispatch(actions: ActionHandler[]) {
  const registry = new DefaultActionRegistry();
  registry.registerAll(actions);
  const dispatcher = new ActionDispatcher(registry);
  const context = new ExecutionContext('run-1', 'flow-1');

  return {
    registry,
    context,
    dispatch(
      name: string,
      selector: Selector | undefined,
      params: Record<string, unknown> = {},
      signal?: AbortSignal
    ): Promise<ActionResult> {
      return dispatcher.dispatch(name, selector, params, context, signal);
    },
  };
}
