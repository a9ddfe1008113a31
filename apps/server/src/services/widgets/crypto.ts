/**
 * Crypto prices from CoinGecko's simple price API (no API key)
 */

import type { CryptoPrice } from '@homelab/types';
import { requestJson, type HttpClient } from '../../lib/http-client.js';
import { asObject, getNumber, isObject, roundTo } from '../../lib/json.js';

export const DEFAULT_COINS = ['bitcoin', 'ethereum'];

/** Coins shown in the scrolling price bar */
export const BAR_COINS = [
  'bitcoin',
  'ethereum',
  'solana',
  'ripple',
  'cardano',
  'dogecoin',
  'polkadot',
  'avalanche-2',
];

function displayName(id: string): string {
  return id.charAt(0).toUpperCase() + id.slice(1);
}

/**
 * Prices in the order requested; coins missing from the response are left out
 */
export function parseCryptoPrices(payload: unknown, coins: string[]): CryptoPrice[] {
  const data = asObject(payload);
  const prices: CryptoPrice[] = [];
  for (const id of coins) {
    const quote = data[id];
    if (!isObject(quote)) continue;
    prices.push({
      id,
      name: displayName(id),
      price: getNumber(quote, 'usd'),
      change_24h: roundTo(getNumber(quote, 'usd_24h_change'), 2),
    });
  }
  return prices;
}

export async function fetchCryptoPrices(http: HttpClient, coins: string[]): Promise<CryptoPrice[]> {
  const params = new URLSearchParams({
    ids: coins.join(','),
    vs_currencies: 'usd',
    include_24hr_change: 'true',
  });
  const payload = await requestJson(
    http,
    `https://api.coingecko.com/api/v3/simple/price?${params.toString()}`,
    { timeoutMs: 5000 }
  );
  return parseCryptoPrices(payload, coins);
}
