/**
 * Mean orbital elements for the closed-form ephemeris.
 *
 * Each element is `base + rate * d`, d = days since 2000 Jan 0.0 UT
 * (JD 2451543.5). Angles in degrees, distances in AU (Moon: Earth radii).
 * Elements are referred to the ecliptic and equinox of date.
 */

export type LinearElement = readonly [base: number, rate: number];

export interface OrbitalElements {
  /** Longitude of the ascending node */
  node: LinearElement;
  inclination: LinearElement;
  /** Argument of perihelion */
  perihelion: LinearElement;
  semi_major_axis: LinearElement;
  eccentricity: LinearElement;
  mean_anomaly: LinearElement;
}

export type OrbitingBody =
  | "sun"
  | "moon"
  | "mercury"
  | "venus"
  | "mars"
  | "jupiter"
  | "saturn"
  | "uranus"
  | "neptune";

export const ELEMENTS_EPOCH_JULIAN_DAY = 2451543.5;

export const MEAN_ELEMENTS: Record<OrbitingBody, OrbitalElements> = {
  // Apparent solar orbit (Earth's orbit seen from Earth)
  sun: {
    node: [0, 0],
    inclination: [0, 0],
    perihelion: [282.9404, 4.70935e-5],
    semi_major_axis: [1, 0],
    eccentricity: [0.016709, -1.151e-9],
    mean_anomaly: [356.047, 0.9856002585],
  },
  moon: {
    node: [125.1228, -0.0529538083],
    inclination: [5.1454, 0],
    perihelion: [318.0634, 0.1643573223],
    semi_major_axis: [60.2666, 0],
    eccentricity: [0.0549, 0],
    mean_anomaly: [115.3654, 13.0649929509],
  },
  mercury: {
    node: [48.3313, 3.24587e-5],
    inclination: [7.0047, 5.0e-8],
    perihelion: [29.1241, 1.01444e-5],
    semi_major_axis: [0.387098, 0],
    eccentricity: [0.205635, 5.59e-10],
    mean_anomaly: [168.6562, 4.0923344368],
  },
  venus: {
    node: [76.6799, 2.4659e-5],
    inclination: [3.3946, 2.75e-8],
    perihelion: [54.891, 1.38374e-5],
    semi_major_axis: [0.72333, 0],
    eccentricity: [0.006773, -1.302e-9],
    mean_anomaly: [48.0052, 1.6021302244],
  },
  mars: {
    node: [49.5574, 2.11081e-5],
    inclination: [1.8497, -1.78e-8],
    perihelion: [286.5016, 2.92961e-5],
    semi_major_axis: [1.523688, 0],
    eccentricity: [0.093405, 2.516e-9],
    mean_anomaly: [18.6021, 0.5240207766],
  },
  jupiter: {
    node: [100.4542, 2.76854e-5],
    inclination: [1.303, -1.557e-7],
    perihelion: [273.8777, 1.64505e-5],
    semi_major_axis: [5.20256, 0],
    eccentricity: [0.048498, 4.469e-9],
    mean_anomaly: [19.895, 0.0830853001],
  },
  saturn: {
    node: [113.6634, 2.3898e-5],
    inclination: [2.4886, -1.081e-7],
    perihelion: [339.3939, 2.97661e-5],
    semi_major_axis: [9.55475, 0],
    eccentricity: [0.055546, -9.499e-9],
    mean_anomaly: [316.967, 0.0334442282],
  },
  uranus: {
    node: [74.0005, 1.3978e-5],
    inclination: [0.7733, 1.9e-8],
    perihelion: [96.6612, 3.0565e-5],
    semi_major_axis: [19.18171, -1.55e-8],
    eccentricity: [0.047318, 7.45e-9],
    mean_anomaly: [142.5905, 0.011725806],
  },
  neptune: {
    node: [131.7806, 3.0173e-5],
    inclination: [1.77, -2.55e-7],
    perihelion: [272.8461, -6.027e-6],
    semi_major_axis: [30.05826, 3.313e-8],
    eccentricity: [0.008606, 2.15e-9],
    mean_anomaly: [260.2471, 0.005995147],
  },
};

export function elementAt(element: LinearElement, days: number): number {
  return element[0] + element[1] * days;
}
