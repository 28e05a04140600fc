import { EMPTY_BYTES } from '../types';
import { encodePricePayload } from './payload';
import type { DataBridge, HexBytes } from '../types';

/**
 * Bridge publishing a fixed payload. Used for off-chain fed prices and in
 * simulations.
 */
export class StaticDataBridge implements DataBridge {
  private data: HexBytes;
  private calls = 0;

  constructor(
    readonly id: string,
    data: HexBytes = EMPTY_BYTES
  ) {
    this.data = data;
  }

  static price(id: string, price1e18: bigint, updatedAt: number): StaticDataBridge {
    return new StaticDataBridge(id, encodePricePayload({ price1e18, updatedAt }));
  }

  get callCount(): number {
    return this.calls;
  }

  setData(data: HexBytes): void {
    this.data = data;
  }

  setPrice(price1e18: bigint, updatedAt: number): void {
    this.data = encodePricePayload({ price1e18, updatedAt });
  }

  async getData(): Promise<HexBytes> {
    this.calls++;
    return this.data;
  }
}
