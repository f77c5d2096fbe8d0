/**
 * =============================================================================
 * POLYLINE UTILITIES
 * =============================================================================
 *
 * Decoder for the encoded polyline format returned by OSRM
 * (5-bit groups, zig-zag signed deltas, precision 1e5).
 * =============================================================================
 */

import { LatLng } from '../types/api.types';

const FACTOR = 1e5;

/**
 * Decode an encoded polyline into [lat, lng] pairs.
 *
 * A string cut in the middle of a group yields the points completed
 * before the cut; nothing is thrown.
 */
export function decodePolyline(encoded: string): LatLng[] {
  const points: LatLng[] = [];
  let index = 0;
  let lat = 0;
  let lng = 0;

  while (index < encoded.length) {
    const deltas: number[] = [];

    for (let axis = 0; axis < 2; axis++) {
      let shift = 0;
      let result = 0;
      let byte: number;

      do {
        if (index >= encoded.length) {
          return points;
        }
        byte = encoded.charCodeAt(index++) - 63;
        result |= (byte & 0x1f) << shift;
        shift += 5;
      } while (byte >= 0x20);

      deltas.push((result & 1) ? ~(result >> 1) : (result >> 1));
    }

    lat += deltas[0];
    lng += deltas[1];
    points.push([lat / FACTOR, lng / FACTOR]);
  }

  return points;
}
