/**
 * Browser Fetcher
 *
 * Drives a headless Chromium through playwright-core. The browser is launched
 * lazily on the first request and shared; each domain gets its own context so
 * cookies and connections stay with the site that set them.
 *
 * Needs a Chromium binary on the host (CHROMIUM_PATH or a playwright install).
 */

import { chromium } from 'playwright-core'
import { FetchError } from '../core/errors.js'
import { BaseFetcher, cancelledError, type AttemptResult, type FetcherOptions } from './fetcher.js'

/** The slice of the Playwright API this fetcher uses */
export interface ResponseLike {
  status(): number
  url(): string
  headers(): Record<string, string>
  text(): Promise<string>
}

export interface PageLike {
  goto(url: string, options: { timeout: number; waitUntil: 'domcontentloaded' }): Promise<ResponseLike | null>
  content(): Promise<string>
  url(): string
  close(): Promise<void>
}

export interface ContextLike {
  newPage(): Promise<PageLike>
  setExtraHTTPHeaders(headers: Record<string, string>): Promise<void>
  close(): Promise<void>
}

export interface BrowserLike {
  newContext(options: { locale?: string; viewport: { width: number; height: number } }): Promise<ContextLike>
  close(): Promise<void>
}

export interface BrowserFetcherOptions extends FetcherOptions {
  /** Replaces the Chromium launch, used by tests */
  launch?: () => Promise<BrowserLike>
  executablePath?: string
}

export class BrowserFetcher extends BaseFetcher {
  private browser: Promise<BrowserLike> | null = null
  private readonly contexts = new Map<string, Promise<ContextLike>>()
  private readonly launcher: () => Promise<BrowserLike>

  constructor(options: BrowserFetcherOptions) {
    super(options)
    this.launcher = options.launch ?? (() => chromium.launch({
      headless: true,
      executablePath: options.executablePath,
    }))
  }

  protected async attempt(target: URL, headers: Record<string, string>, signal?: AbortSignal): Promise<AttemptResult> {
    const context = await this.context(target.hostname.toLowerCase())
    await context.setExtraHTTPHeaders(headers)

    const page = await context.newPage()
    const onRunAbort = () => {
      void page.close().catch((error: unknown) => {
        this.options.logger?.debug('Closing aborted page failed', { url: target.href, error: String(error) })
      })
    }
    signal?.addEventListener('abort', onRunAbort, { once: true })

    try {
      const response = await page.goto(target.href, {
        timeout: this.options.requestTimeoutMs,
        waitUntil: 'domcontentloaded',
      })

      if (!response) {
        throw new FetchError('network', 'transient', `No response for ${target.href}`)
      }

      // Feeds and calendars are read raw, pages as rendered
      const contentType = response.headers()['content-type'] ?? ''
      const body = contentType.includes('html') ? await page.content() : await response.text()

      return { status: response.status(), body, finalUrl: page.url() || response.url() }
    } catch (error) {
      if (signal?.aborted) {
        throw cancelledError(target.href, error)
      }
      if (error instanceof FetchError) throw error
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new FetchError('timeout', 'transient', `Navigation to ${target.href} timed out`, null, error)
      }
      const message = error instanceof Error ? error.message : String(error)
      throw new FetchError('network', 'transient', `Navigation to ${target.href} failed: ${message}`, null, error)
    } finally {
      signal?.removeEventListener('abort', onRunAbort)
      if (!signal?.aborted) {
        await page.close()
      }
    }
  }

  async close(): Promise<void> {
    const browser = this.browser
    this.browser = null
    this.contexts.clear()
    if (browser) {
      await (await browser).close()
    }
  }

  private launchBrowser(): Promise<BrowserLike> {
    if (!this.browser) {
      this.browser = this.launcher().catch((error: unknown) => {
        this.browser = null
        const message = error instanceof Error ? error.message : String(error)
        throw new FetchError('network', 'permanent', `Could not launch browser: ${message}`, null, error)
      })
    }
    return this.browser
  }

  private context(domain: string): Promise<ContextLike> {
    let context = this.contexts.get(domain)
    if (!context) {
      context = this.launchBrowser().then(browser => browser.newContext({
        locale: this.options.acceptLanguage.split(',')[0],
        viewport: { width: 1280, height: 800 },
      }))
      void context.catch(() => this.contexts.delete(domain))
      this.contexts.set(domain, context)
    }
    return context
  }
}
