import type { Location } from '../types';

export type StateMarketTable = Readonly<Record<string, string>>;

// Nearest physical market per state. Several states trade through a neighbour's mandi.
export const DEFAULT_STATE_MARKETS: StateMarketTable = Object.freeze({
  'Delhi': 'Delhi',
  'Haryana': 'Delhi',
  'Punjab': 'Punjab',
  'UP': 'UP',
  'Uttar Pradesh': 'UP',
  'Maharashtra': 'Mumbai',
  'Gujarat': 'Gujarat',
  'Karnataka': 'Karnataka',
  'Tamil Nadu': 'Chennai',
  'West Bengal': 'Kolkata',
  'Bihar': 'Bihar',
  'Rajasthan': 'Rajasthan',
  'Madhya Pradesh': 'Madhya Pradesh',
  'Andhra Pradesh': 'Andhra Pradesh',
  'Telangana': 'Telangana',
  'Kerala': 'Kerala',
  'Odisha': 'Odisha',
  'Assam': 'Assam'
});

export const UNKNOWN_MARKET = 'Unknown';

export class MarketResolver {
  constructor(private readonly stateMarkets: StateMarketTable = DEFAULT_STATE_MARKETS) {}

  /**
   * A state found in the table always wins, even when its market is not among
   * `knownMarkets`. Otherwise the commodity's first non-blank known market is used,
   * then the state itself, then `UNKNOWN_MARKET` when the state is blank.
   */
  resolveMarket(location: Location, knownMarkets: readonly string[]): string {
    const state = location.state.trim();
    if (Object.prototype.hasOwnProperty.call(this.stateMarkets, state) && this.stateMarkets[state]) {
      return this.stateMarkets[state];
    }

    const known = knownMarkets.find(market => market.trim().length > 0);
    return known ?? (state || UNKNOWN_MARKET);
  }
}
