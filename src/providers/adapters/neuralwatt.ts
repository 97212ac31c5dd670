/**
 * NeuralWatt adapter.
 * An OpenAI-compatible endpoint that reports per-request energy use, as an
 * `: energy {...}` SSE comment when streaming and as a top-level `energy`
 * object otherwise.
 */

import { BaseAdapter } from '../base-adapter.js';

export const NEURALWATT_BASE_URL = 'https://api.neuralwatt.com/v1';

export class NeuralWattAdapter extends BaseAdapter {
  constructor(id: string, name: string, apiKey: string, baseUrl?: string, timeout?: number) {
    super(id, 'neuralwatt', name, apiKey, baseUrl ?? NEURALWATT_BASE_URL, timeout);
  }
}
