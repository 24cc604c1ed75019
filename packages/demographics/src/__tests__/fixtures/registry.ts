/**
 * Small registry used across pipeline tests
 */

import type { RegistryData } from '../../registry/station-registry.js';

export const BOROUGH_CODE = '1001';
export const REGION_CODE = '1002';
export const COUNTRY_CODE = '1003';

export const TEST_DATASETS = {
  population: 'DS_POP',
  age: 'DS_AGE',
  ethnicity: 'DS_ETH',
  religion: 'DS_REL',
  gender: 'DS_SEX',
  disability: 'DS_DIS',
} as const;

export function testRegistryData(): RegistryData {
  return {
    stations: [
      {
        name: 'Lewisham Way Shaft',
        wards: [
          { name: 'Brockley', areaCode: '2001' },
          { name: 'Deptford', areaCode: '2002' },
        ],
      },
      {
        name: 'Old Kent Road 1',
        wards: [
          { name: 'Old Kent Road', areaCode: '2003' },
          { name: 'Faraday', areaCode: '2004' },
          { name: "St George's", areaCode: '2005' },
        ],
      },
    ],
    comparisonAreas: [
      { name: 'Southwark', areaCode: BOROUGH_CODE, level: 'borough' },
      { name: 'London', areaCode: REGION_CODE, level: 'region' },
      { name: 'England', areaCode: COUNTRY_CODE, level: 'country' },
    ],
    datasets: { ...TEST_DATASETS },
    localAuthorities: ['Lambeth', 'Southwark', 'Lewisham'],
    regionAuthority: 'Greater London Authority',
  };
}
