/**
 * Demo marker set around the default camera centre.
 */

import type { Marker } from '../types';

export const SAMPLE_MARKERS: readonly Marker[] = [
  { id: 'brandenburger-tor', position: { lat: 52.5163, lng: 13.3777 } },
  { id: 'alexanderplatz', position: { lat: 52.5219, lng: 13.4132 } },
  { id: 'tempelhofer-feld', position: { lat: 52.4735, lng: 13.4039 } },
  { id: 'tiergarten', position: { lat: 52.5145, lng: 13.3501 } },
  { id: 'east-side-gallery', position: { lat: 52.5050, lng: 13.4397 } },
  {
    id: 'fernsehturm',
    position: { lat: 52.5208, lng: 13.4094 },
    style: { width: 32, height: 48, anchor: { x: 0.5, y: 0 } },
  },
];
