import { describe, it, expect } from 'vitest';
import { fetchCryptoPrices, parseCryptoPrices } from '@/services/widgets/crypto.js';
import { FakeHttp } from '../../../helpers/fake-http.js';

describe('crypto.ts', () => {
  it('should keep requested order and drop coins without a quote', () => {
    const payload = {
      ethereum: { usd: 3200, usd_24h_change: -0.456 },
      bitcoin: { usd: 65000.5, usd_24h_change: 1.23456 },
      solana: 'bad',
    };

    expect(parseCryptoPrices(payload, ['bitcoin', 'ethereum', 'solana', 'dogecoin'])).toEqual([
      { id: 'bitcoin', name: 'Bitcoin', price: 65000.5, change_24h: 1.23 },
      { id: 'ethereum', name: 'Ethereum', price: 3200, change_24h: -0.46 },
    ]);
  });

  it('should query CoinGecko for the coin ids in USD', async () => {
    const http = new FakeHttp().on('https://api.coingecko.com/api/v3/simple/price', {
      json: { bitcoin: { usd: 1, usd_24h_change: 0 } },
    });

    const prices = await fetchCryptoPrices(http.client, ['bitcoin', 'ethereum']);
    const url = new URL(http.urls()[0]);

    expect(prices).toEqual([{ id: 'bitcoin', name: 'Bitcoin', price: 1, change_24h: 0 }]);
    expect(url.searchParams.get('ids')).toBe('bitcoin,ethereum');
    expect(url.searchParams.get('vs_currencies')).toBe('usd');
    expect(url.searchParams.get('include_24hr_change')).toBe('true');
    expect(http.requests[0].options.timeoutMs).toBe(5000);
  });
});
