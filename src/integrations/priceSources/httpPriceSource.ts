import { z } from 'zod';
import { PriceSource, PriceSourceResolver } from '../../domain/oracle/oracleTypes.js';
import {
  PriceSourceHttpError,
  PriceSourceNetworkError,
  PriceSourceResponseError,
} from './errorMapping.js';

export interface HttpPriceSourceConfig {
  /** Path appended to the source's base URL, e.g. `/price`. */
  pricePath: string;
  fetch?: typeof globalThis.fetch;
}

const priceBodySchema = z.object({
  price: z.union([
    z.string().regex(/^-?\d+$/),
    z.number().int().refine(Number.isSafeInteger, 'price exceeds safe integer range'),
  ]),
});

const sanitizePath = (value: string): string => (value.startsWith('/') ? value : `/${value}`);

/**
 * Price source reachable over HTTP: `GET <address><pricePath>?asset=<asset>`
 * answering `{ "price": "<integer>" }`.
 */
export class HttpPriceSource implements PriceSource {
  private readonly fetchImpl: typeof globalThis.fetch;

  constructor(
    private readonly address: string,
    private readonly config: HttpPriceSourceConfig,
  ) {
    this.fetchImpl = config.fetch ?? globalThis.fetch;
  }

  async getPrice(asset: string, signal?: AbortSignal): Promise<bigint> {
    const url = new URL(sanitizePath(this.config.pricePath), this.address);
    url.searchParams.set('asset', asset);

    let response: Response;
    let bodyText: string;
    try {
      response = await this.fetchImpl(url.toString(), {
        method: 'GET',
        headers: { accept: 'application/json' },
        signal,
      });
      bodyText = await response.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw error;
      }
      throw new PriceSourceNetworkError(this.address, 'Failed to reach price source.');
    }

    if (!response.ok) {
      throw new PriceSourceHttpError(this.address, response.status, bodyText);
    }

    let body: unknown;
    try {
      body = JSON.parse(bodyText);
    } catch {
      throw new PriceSourceResponseError(this.address, 'Response body is not JSON.');
    }

    const parsed = priceBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new PriceSourceResponseError(this.address, 'Response body has no integer price.');
    }
    return BigInt(parsed.data.price);
  }
}

/**
 * Treats every http(s) URL address as an HTTP price source. Sources hold no
 * state, so each lookup builds a fresh one.
 */
export class HttpPriceSourceResolver implements PriceSourceResolver {
  constructor(private readonly config: HttpPriceSourceConfig) {}

  resolve(address: string): PriceSource | null {
    if (!URL.canParse(address)) return null;
    const { protocol } = new URL(address);
    if (protocol !== 'http:' && protocol !== 'https:') return null;

    return new HttpPriceSource(address, this.config);
  }
}

/** In-process sources registered by address. */
export class StaticPriceSourceResolver implements PriceSourceResolver {
  private readonly sources = new Map<string, PriceSource>();

  register(address: string, source: PriceSource): this {
    this.sources.set(address, source);
    return this;
  }

  unregister(address: string): void {
    this.sources.delete(address);
  }

  resolve(address: string): PriceSource | null {
    return this.sources.get(address) ?? null;
  }
}

/** First resolver that knows the address wins. */
export class ChainedPriceSourceResolver implements PriceSourceResolver {
  constructor(private readonly resolvers: readonly PriceSourceResolver[]) {}

  resolve(address: string): PriceSource | null {
    for (const resolver of this.resolvers) {
      const source = resolver.resolve(address);
      if (source) return source;
    }
    return null;
  }
}
