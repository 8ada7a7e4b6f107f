import type { ElementHandle, FindOptions, Locator, PageHandle } from '../types/index.js';

/** The slice of Playwright's Locator API the adapters use. */
export interface PlaywrightLocator {
  first(): PlaywrightLocator;
  locator(selector: string): PlaywrightLocator;
  waitFor(options?: {
    state?: 'attached' | 'detached' | 'visible' | 'hidden';
    timeout?: number;
  }): Promise<void>;
  all(): Promise<PlaywrightLocator[]>;
  getAttribute(name: string, options?: { timeout?: number }): Promise<string | null>;
  allInnerTexts(): Promise<string[]>;
  click(options?: { timeout?: number }): Promise<void>;
  fill(value: string, options?: { timeout?: number }): Promise<void>;
  selectOption(values: string, options?: { timeout?: number }): Promise<string[]>;
}

/** The slice of Playwright's Page API the adapters use. */
export interface PlaywrightPage {
  locator(selector: string): PlaywrightLocator;
  goto(
    url: string,
    options?: { waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit' },
  ): Promise<unknown>;
  url(): string;
}

const TEXT_BEARING_ELEMENTS = [
  'a',
  'button',
  'label',
  'summary',
  'legend',
  'option',
  'th',
  'td',
  'li',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'p',
  'span',
  '[role]',
].join(', ');

/**
 * PageHandle over a live Playwright page. Playwright calls cannot be cancelled
 * once issued, but each one is bounded by its own timeout; an aborted signal
 * stops the handle from waiting on them.
 */
export class PlaywrightPageHandle implements PageHandle {
  constructor(private page: PlaywrightPage) {}

  async find(locator: Locator, options: FindOptions): Promise<ElementHandle | null> {
    const target = this.page.locator(locator).first();
    try {
      await abortable(
        () => target.waitFor({ state: 'visible', timeout: options.timeoutMs }),
        options.signal,
      );
      return target;
    } catch (error) {
      if (options.signal?.aborted) throw error;
      if (isPlaywrightTimeout(error)) return null;
      throw error;
    }
  }

  async allText(signal?: AbortSignal): Promise<string[]> {
    return abortable(() => this.page.locator(TEXT_BEARING_ELEMENTS).allInnerTexts(), signal);
  }

  async allIdentifiers(signal?: AbortSignal): Promise<string[]> {
    const read = async () => {
      const elements = await this.page.locator('[id]').all();
      const ids = await Promise.all(elements.map((el) => el.getAttribute('id')));
      return ids.filter((id): id is string => id !== null && id.length > 0);
    };
    return abortable(read, signal);
  }

  /**
   * Children of the locator's parent, described by id or class list plus
   * position, e.g. `form > .btn.primary:nth-child(2)`.
   */
  async structuralSiblings(locator: Locator, signal?: AbortSignal): Promise<Locator[]> {
    const parent = parentSelector(locator);
    if (!parent) return [];

    const read = async () => {
      const children = await this.page.locator(parent).first().locator(':scope > *').all();
      return Promise.all(
        children.map(async (child, i) => {
          const id = await child.getAttribute('id');
          if (id && /^[A-Za-z_][\w-]*$/.test(id)) return `${parent} > #${id}`;
          const classes = (await child.getAttribute('class'))?.trim().split(/\s+/).filter(Boolean) ?? [];
          const classPart = classes.map((c) => `.${c}`).join('');
          return `${parent} > ${classPart}:nth-child(${i + 1})`;
        }),
      );
    };
    return abortable(read, signal);
  }
}

/** `form > button.old` -> `form`; `#a .b` -> `#a`; single-segment locators have none. */
export function parentSelector(locator: Locator): string | null {
  if (/^(text|role|xpath)=/.test(locator) || locator.startsWith('//')) return null;
  const parent = locator.trim().replace(/\s*(?:>|\s)\s*[^\s>]+$/, '');
  return parent && parent !== locator.trim() ? parent : null;
}

export function isPlaywrightTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

/** Start `task` unless already aborted, and stop waiting for it once `signal` aborts. */
function abortable<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return task();
  if (signal.aborted) return Promise.reject(signal.reason);
  const promise = task();
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
