/**
 * CLI テスト用のロケーション
 */

import { Location } from '../../types';

export function location(overrides: Partial<Location> & Pick<Location, 'id' | 'name'>): Location {
  return {
    country: '',
    country_code: '',
    favorite: false,
    icon: '',
    last_connected_time: null,
    protocols: '',
    recommended: false,
    region: '',
    sort_order: 0,
    update_time: null,
    ...overrides,
  };
}

export const frankfurt = location({
  id: 'de-fra',
  name: 'Germany - Frankfurt',
  country: 'Germany',
  country_code: 'DE',
  region: 'Europe',
  favorite: true,
});

export const berlin = location({
  id: 'de-ber',
  name: 'Germany - Berlin',
  country: 'Germany',
  country_code: 'DE',
  region: 'Europe',
});

export const paris = location({
  id: 'fr-par',
  name: 'France - Paris',
  country: 'France',
  country_code: 'FR',
  region: 'Europe',
});

export const tokyo = location({
  id: 'jp-tok',
  name: 'Japan - Tokyo',
  country: 'Japan',
  country_code: 'JP',
  region: 'Asia Pacific',
});

export const smart = location({
  id: 'smart',
  name: 'Smart Location',
  country: 'Smart',
  country_code: 'XX',
  region: 'Americas',
});

export const allLocations = [frankfurt, berlin, paris, tokyo, smart];
