/**
 * Page Driver Capability
 *
 * The abstract surface the engine uses to observe and manipulate a remote
 * rendered page. Any DOM-automation technology that satisfies this interface
 * is substitutable (the Playwright adapter lives in core/playwright-page-driver).
 *
 * Probes (`find`, `getAttribute`) return null for expected absence.
 * Everything else throws when the page or its connection is unusable.
 */

/**
 * Opaque handle to one element matched by a selector
 */
export interface ElementRef {
  /** Selector the element was resolved from */
  readonly selector: string;
  /** Zero-based position among the selector's matches */
  readonly nth: number;
}

export interface PageDriver {
  navigate(url: string): Promise<void>;
  /** First visible match, or null when nothing matches */
  find(selector: string): Promise<ElementRef | null>;
  findAll(selector: string): Promise<ElementRef[]>;
  click(ref: ElementRef): Promise<void>;
  /** Replace the element's value with `text` */
  type(ref: ElementRef, text: string): Promise<void>;
  readText(ref: ElementRef): Promise<string>;
  getAttribute(ref: ElementRef, name: string): Promise<string | null>;
  currentUrl(): Promise<string>;
  /** Evaluate a script expression in the page; callers narrow the result */
  executeScript(script: string): Promise<unknown>;
  /** Release the underlying browser resources. Idempotent. */
  close(): Promise<void>;
}
