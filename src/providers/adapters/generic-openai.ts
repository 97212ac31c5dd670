/**
 * Generic OpenAI-compatible adapter.
 * For servers that follow the OpenAI API without metering or other quirks.
 * Requires an explicit baseUrl.
 */

import { logger } from '../../shared/logger.js';
import type { ChatCompletionRequest } from '../../shared/types.js';
import { BaseAdapter } from '../base-adapter.js';

export class GenericOpenAIAdapter extends BaseAdapter {
  private readonly dropParams: readonly string[];

  /**
   * @param dropParams - Request parameters this server rejects; removed before sending.
   */
  constructor(
    id: string,
    name: string,
    apiKey: string,
    baseUrl: string,
    timeout?: number,
    dropParams: readonly string[] = [],
  ) {
    super(id, 'generic-openai', name, apiKey, baseUrl, timeout);
    this.dropParams = dropParams;
  }

  protected override prepareRequestBody(
    model: string,
    body: ChatCompletionRequest,
  ): Record<string, unknown> {
    const prepared = super.prepareRequestBody(model, body);

    for (const param of this.dropParams) {
      if (param in prepared) {
        logger.debug({ provider: this.id, model, param }, 'Stripping unsupported parameter');
        delete prepared[param];
      }
    }

    return prepared;
  }
}
