import type { Selector } from '@deskpilot/core';

/**
 * Capability interfaces the built-in actions drive. Hosts plug in a real
 * browser driver, image matcher or desktop automation layer; tests plug in fakes.
 */

export interface Point {
  x: number;
  y: number;
}

export interface Region extends Point {
  width: number;
  height: number;
}

export type ElementState = 'visible' | 'hidden' | 'attached' | 'detached';

export interface DownloadResult {
  path: string;
  filename: string;
}

export interface BrowserBackend {
  open(url: string): Promise<void>;
  click(selector: Selector): Promise<void>;
  fill(selector: Selector, value: string): Promise<void>;
  /** Resolves with the values actually selected */
  select(selector: Selector, values: string[]): Promise<string[]>;
  upload(selector: Selector, files: string[]): Promise<void>;
  /** Single non-blocking probe; `wait_for` polls it */
  matches(selector: Selector, state: ElementState): Promise<boolean>;
  /** Click `selector` and wait for the resulting download */
  download(selector: Selector, options: { saveAs?: string; signal: AbortSignal }): Promise<DownloadResult>;
  evaluate(script: string, args: readonly unknown[]): Promise<unknown>;
  /** Resolves with the written file path, or base64 PNG when no path is given */
  screenshot(options: { selector?: Selector; path?: string; fullPage: boolean }): Promise<string>;
}

export interface ImageMatch extends Region {
  /** 0..1 */
  confidence: number;
}

export interface ImageMatchOptions {
  scale: number;
  tolerance: number;
  dpi: number;
  region?: Region;
}

export interface ImageMatcher {
  /** Screen-space bounding box of the best match, or null */
  find(template: string, options: ImageMatchOptions): Promise<ImageMatch | null>;
}

export type MouseButton = 'left' | 'right' | 'middle';

export interface DesktopBackend {
  pointerPosition(): Promise<Point>;
  click(point: Point, options: { button: MouseButton; clicks: number }): Promise<void>;
  /** Base64 PNG of a screen region */
  capture(region: Region): Promise<string>;
  elementBounds(selector: Selector): Promise<Region | null>;
  windowBounds(selector: Selector): Promise<Region | null>;
  screenDpi(): Promise<number>;
}

export interface TableRow {
  index: number;
  cells: Record<string, string>;
}

export interface TableBackend {
  rows(selector: Selector): Promise<TableRow[]>;
  selectRow(selector: Selector, index: number): Promise<void>;
}

/**
 * Backends available to `createBuiltinActions`. A family whose backend is
 * missing is not registered at all.
 */
export interface ActionBackends {
  browser?: BrowserBackend;
  images?: ImageMatcher;
  desktop?: DesktopBackend;
  tables?: TableBackend;
}
