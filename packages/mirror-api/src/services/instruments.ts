/**
 * Instrument catalog
 * The tradable universe per provider and asset class, mirrored from the provider
 * on demand. AllSymbols requests resolve through here.
 */

import type { MirrorStore } from './store.js';
import type { ProviderClient } from '../providers/index.js';
import type { Instrument } from '../types/index.js';

export class InstrumentService {
  constructor(private readonly store: MirrorStore) {}

  async list(provider: string, assetClass: string): Promise<Instrument[]> {
    return this.store.listInstruments(provider, assetClass);
  }

  /**
   * Pull the provider's instrument list and upsert it. Returns the number of instruments written.
   */
  async refresh(client: ProviderClient): Promise<number> {
    const instruments = await client.listInstruments();
    const written = await this.store.upsertInstruments(instruments);
    console.log(
      `[Instruments] Refreshed ${written} ${client.name}/${client.dataset.descriptor.assetClass} instruments`
    );
    return written;
  }

  /**
   * Every known symbol for the client's provider and asset class, refreshing
   * from the provider when nothing is stored yet
   */
  async allSymbols(client: ProviderClient): Promise<string[]> {
    const { assetClass } = client.dataset.descriptor;
    let instruments = await this.list(client.name, assetClass);
    if (instruments.length === 0) {
      console.log(`[Instruments] No ${client.name}/${assetClass} instruments stored, fetching`);
      await this.refresh(client);
      instruments = await this.list(client.name, assetClass);
    }
    return instruments.map((i) => i.symbol);
  }
}
