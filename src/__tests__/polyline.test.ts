/**
 * =============================================================================
 * POLYLINE DECODER - Unit Tests
 * =============================================================================
 */

import { decodePolyline } from '../shared/utils/polyline.utils';
import { LatLng } from '../shared/types/api.types';

// Reference encoder, used only to check decode(encode(x)) ≈ x
function encodeValue(delta: number): string {
  let value = delta < 0 ? ~(delta << 1) : delta << 1;
  let output = '';
  while (value >= 0x20) {
    output += String.fromCharCode((0x20 | (value & 0x1f)) + 63);
    value >>= 5;
  }
  return output + String.fromCharCode(value + 63);
}

function encodePolyline(points: LatLng[]): string {
  let previousLat = 0;
  let previousLng = 0;
  let output = '';
  for (const [latitude, longitude] of points) {
    const lat = Math.round(latitude * 1e5);
    const lng = Math.round(longitude * 1e5);
    output += encodeValue(lat - previousLat) + encodeValue(lng - previousLng);
    previousLat = lat;
    previousLng = lng;
  }
  return output;
}

function expectPoints(actual: LatLng[], expected: LatLng[]): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach(([latitude, longitude], i) => {
    expect(actual[i][0]).toBeCloseTo(latitude, 5);
    expect(actual[i][1]).toBeCloseTo(longitude, 5);
  });
}

describe('decodePolyline', () => {
  it('decodes the canonical three-point example', () => {
    expectPoints(decodePolyline('_p~iF~ps|U_ulLnnqC_mqNvxq`@'), [
      [38.5, -120.2],
      [40.7, -120.95],
      [43.252, -126.453],
    ]);
  });

  it('returns an empty list for an empty string', () => {
    expect(decodePolyline('')).toEqual([]);
  });

  describe('truncated input', () => {
    it('keeps the points completed before a cut inside the next longitude', () => {
      expectPoints(decodePolyline('_p~iF~ps|U_ulL'), [[38.5, -120.2]]);
    });

    it('keeps the points completed before a cut inside the next latitude', () => {
      expectPoints(decodePolyline('_p~iF~ps|U_u'), [[38.5, -120.2]]);
    });

    it('returns nothing when the first group is incomplete', () => {
      expect(decodePolyline('_p~')).toEqual([]);
    });
  });

  it('round-trips through a reference encoder', () => {
    const route: LatLng[] = [
      [12.9716, 77.5946],
      [12.97312, 77.59801],
      [12.96955, 77.60004],
      [-33.86785, 151.20732],
      [0, 0],
    ];

    expectPoints(decodePolyline(encodePolyline(route)), route);
  });
});
