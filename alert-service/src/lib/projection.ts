import type { GeoPointLike } from "@aq-alerts/types";

export type PlanarPoint = {
  easting: number;
  northing: number;
};

// GRS80, the NAD83 ellipsoid.
const SEMI_MAJOR_AXIS = 6_378_137;
const FLATTENING = 1 / 298.257222101;
const SCALE_FACTOR = 0.9996;
const FALSE_EASTING = 500_000;

const E2 = FLATTENING * (2 - FLATTENING);
const E4 = E2 * E2;
const E6 = E4 * E2;
const EP2 = E2 / (1 - E2);

const toRadians = (deg: number) => (deg * Math.PI) / 180;

export function centralMeridian(zone: number): number {
  return (zone - 1) * 6 - 180 + 3;
}

function meridianArc(phi: number): number {
  return SEMI_MAJOR_AXIS * (
    (1 - E2 / 4 - (3 * E4) / 64 - (5 * E6) / 256) * phi
    - ((3 * E2) / 8 + (3 * E4) / 32 + (45 * E6) / 1024) * Math.sin(2 * phi)
    + ((15 * E4) / 256 + (45 * E6) / 1024) * Math.sin(4 * phi)
    - ((35 * E6) / 3072) * Math.sin(6 * phi)
  );
}

/**
 * Transverse Mercator forward projection onto a fixed UTM zone. Points are
 * projected onto the configured zone even when they fall outside it, and no
 * false northing is applied south of the equator, so that every distance is
 * measured in one plane.
 */
export function projectUtm(point: GeoPointLike, zone: number): PlanarPoint {
  const phi = toRadians(point.lat);
  const lambda = toRadians(point.lon - centralMeridian(zone));

  const sinPhi = Math.sin(phi);
  const cosPhi = Math.cos(phi);
  const tanPhi = Math.tan(phi);

  const n = SEMI_MAJOR_AXIS / Math.sqrt(1 - E2 * sinPhi * sinPhi);
  const t = tanPhi * tanPhi;
  const c = EP2 * cosPhi * cosPhi;
  const a = lambda * cosPhi;

  const easting = FALSE_EASTING + SCALE_FACTOR * n * (
    a
    + ((1 - t + c) * a ** 3) / 6
    + ((5 - 18 * t + t * t + 72 * c - 58 * EP2) * a ** 5) / 120
  );

  const northing = SCALE_FACTOR * (
    meridianArc(phi)
    + n * tanPhi * (
      (a * a) / 2
      + ((5 - t + 9 * c + 4 * c * c) * a ** 4) / 24
      + ((61 - 58 * t + t * t + 600 * c - 330 * EP2) * a ** 6) / 720
    )
  );

  return { easting, northing };
}

export function planarDistanceMeters(a: GeoPointLike, b: GeoPointLike, zone: number): number {
  const pa = projectUtm(a, zone);
  const pb = projectUtm(b, zone);
  return Math.hypot(pa.easting - pb.easting, pa.northing - pb.northing);
}
