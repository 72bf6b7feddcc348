import type { Waypoint } from '@cellsim/domain';

/** Walking loop around central Tokyo; first and last points coincide. */
export const TOKYO_LOOP: readonly Waypoint[] = [
  { name: 'Tokyo Station', lat: 35.6812, lon: 139.7671 },
  { name: 'Imperial Palace', lat: 35.6852, lon: 139.7528 },
  { name: 'Kudanshita', lat: 35.6938, lon: 139.751 },
  { name: 'Iidabashi', lat: 35.702, lon: 139.745 },
  { name: 'Korakuen', lat: 35.7078, lon: 139.7509 },
  { name: 'Ochanomizu', lat: 35.6994, lon: 139.7633 },
  { name: 'Akihabara', lat: 35.6984, lon: 139.7731 },
  { name: 'Ueno Park', lat: 35.7146, lon: 139.7734 },
  { name: 'Asakusa', lat: 35.7148, lon: 139.7967 },
  { name: 'Skytree', lat: 35.7101, lon: 139.8107 },
  { name: 'Ryogoku', lat: 35.6962, lon: 139.7939 },
  { name: 'Kiyosumi Garden', lat: 35.6812, lon: 139.7975 },
  { name: 'Tsukiji', lat: 35.6654, lon: 139.7707 },
  { name: 'Ginza', lat: 35.6717, lon: 139.7645 },
  { name: 'Hibiya Park', lat: 35.6735, lon: 139.7568 },
  { name: 'Tokyo Tower', lat: 35.6586, lon: 139.7454 },
  { name: 'Roppongi', lat: 35.6627, lon: 139.7312 },
  { name: 'Akasaka', lat: 35.6765, lon: 139.7376 },
  { name: 'Yotsuya', lat: 35.686, lon: 139.7301 },
  { name: 'Back to Tokyo Station', lat: 35.6812, lon: 139.7671 },
];
