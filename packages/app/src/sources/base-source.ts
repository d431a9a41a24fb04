/**
 * Listener bookkeeping shared by all sources
 */

import type { Bar, HistoricalRequest } from '@crosslag/contracts';
import { EventBus } from '@crosslag/bar-sync';
import type { Logger } from '@crosslag/logger';
import type { BarListener, BarSource, SourceEventMap, TickListener } from './types.js';

export abstract class BaseBarSource implements BarSource {
  abstract readonly name: string;

  protected readonly events: EventBus<SourceEventMap>;
  protected readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
    this.events = new EventBus<SourceEventMap>(logger);
  }

  onBar(listener: BarListener): () => void {
    return this.events.on('bar', listener);
  }

  onTick(listener: TickListener): () => void {
    return this.events.on('tick', listener);
  }

  abstract contractSymbol(): string;
  abstract fetchHistorical(request: HistoricalRequest): Promise<Bar[]>;
  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;
}
