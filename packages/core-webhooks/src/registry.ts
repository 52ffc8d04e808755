import { createSilentLogger, type Logger } from '@taskhook/core-logging';

import type { WebhookHandler } from './types.js';

/**
 * Provider name to handler. Registering a provider again replaces the
 * previous handler.
 */
export class WebhookRegistry {
  private readonly handlers = new Map<string, WebhookHandler>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  register(provider: string, handler: WebhookHandler): void {
    if (this.handlers.has(provider)) {
      this.logger.warn('Replacing webhook handler', { provider });
    }
    this.handlers.set(provider, handler);
  }

  unregister(provider: string): boolean {
    return this.handlers.delete(provider);
  }

  getHandler(provider: string): WebhookHandler | undefined {
    return this.handlers.get(provider);
  }

  /** In registration order. */
  listProviders(): string[] {
    return [...this.handlers.keys()];
  }
}
