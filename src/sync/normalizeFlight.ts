import { createHash } from 'node:crypto';

import { z } from 'zod';

import { FlightSyncError } from './errors';
import type { FlightRecord, FlightStatus } from './types';
import {
  feetToMetres,
  isRecord,
  knotsToMetresPerSecond,
  normalizeFlightId,
  pickFirst,
  roundTo,
  toNullableBoolean,
  toNullableDate,
  toNullableNumber,
  toNullableString,
  type UnknownRecord,
} from './utils';

// Positions in an OpenSky state vector.
const STATE = {
  icao24: 0,
  callsign: 1,
  originCountry: 2,
  timePosition: 3,
  lastContact: 4,
  longitude: 5,
  latitude: 6,
  baroAltitude: 7,
  onGround: 8,
  velocity: 9,
  trueTrack: 10,
  verticalRate: 11,
  geoAltitude: 13,
} as const;

const MIN_STATE_VECTOR_LENGTH = 12;

const statesEnvelopeSchema = z.object({
  time: z.number().nullable().optional(),
  states: z.array(z.unknown()).nullable(),
});

const STATUS_ALIASES = new Map<string, FlightStatus>([
  ['scheduled', 'scheduled'],
  ['airborne', 'airborne'],
  ['en-route', 'airborne'],
  ['enroute', 'airborne'],
  ['active', 'airborne'],
  ['landed', 'landed'],
  ['arrived', 'landed'],
]);

type DetailFields = {
  callsign: string | null;
  origin: string | null;
  destination: string | null;
  originCountry: string | null;
  onGround: boolean | null;
  lat: number | null;
  lon: number | null;
  altitudeM: number | null;
  headingDeg: number | null;
  speedMps: number | null;
  verticalRateMps: number | null;
  upstreamStatus: string | null;
  timestamp: Date | null;
};

const validationError = (flightId: string, reason: string) =>
  new FlightSyncError('ValidationFailed', `Invalid detail payload for ${flightId}: ${reason}`);

const fromStateVector = (state: unknown[], envelopeTime: Date | null): DetailFields => ({
  callsign: toNullableString(state[STATE.callsign]),
  origin: null,
  destination: null,
  originCountry: toNullableString(state[STATE.originCountry]),
  onGround: toNullableBoolean(state[STATE.onGround]),
  lat: toNullableNumber(state[STATE.latitude]),
  lon: toNullableNumber(state[STATE.longitude]),
  altitudeM:
    toNullableNumber(state[STATE.baroAltitude]) ?? toNullableNumber(state[STATE.geoAltitude]),
  headingDeg: toNullableNumber(state[STATE.trueTrack]),
  speedMps: toNullableNumber(state[STATE.velocity]),
  verticalRateMps: toNullableNumber(state[STATE.verticalRate]),
  upstreamStatus: null,
  timestamp:
    toNullableDate(state[STATE.timePosition]) ??
    toNullableDate(state[STATE.lastContact]) ??
    envelopeTime,
});

const readAltitude = (source: UnknownRecord): { altitudeM: number | null; onGround: boolean | null } => {
  const metres = toNullableNumber(pickFirst(source, ['baro_altitude', 'geo_altitude', 'altitude_m']));
  if (metres !== null) {
    return { altitudeM: metres, onGround: null };
  }

  const feetValue = pickFirst(source, ['alt_baro', 'altitude_ft']);
  if (typeof feetValue === 'string' && feetValue.trim().toLowerCase() === 'ground') {
    return { altitudeM: 0, onGround: true };
  }

  const feet = toNullableNumber(feetValue);

  return { altitudeM: feet === null ? null : roundTo(feetToMetres(feet), 2), onGround: null };
};

const readSpeed = (source: UnknownRecord): number | null => {
  const metresPerSecond = toNullableNumber(pickFirst(source, ['velocity', 'speed_mps']));
  if (metresPerSecond !== null) {
    return metresPerSecond;
  }

  const knots = toNullableNumber(pickFirst(source, ['gs', 'ground_speed_kt']));

  return knots === null ? null : roundTo(knotsToMetresPerSecond(knots), 2);
};

const fromFlatObject = (flightId: string, source: UnknownRecord): DetailFields => {
  const declaredId = pickFirst(source, ['icao24', 'hex', 'flight_id']);
  if (declaredId !== undefined && normalizeFlightId(declaredId) !== flightId) {
    throw validationError(flightId, `payload describes ${String(declaredId)}`);
  }

  const altitude = readAltitude(source);
  const onGround = toNullableBoolean(pickFirst(source, ['on_ground', 'onGround'])) ?? altitude.onGround;

  return {
    callsign: toNullableString(pickFirst(source, ['callsign', 'flight'])),
    origin: toNullableString(pickFirst(source, ['origin', 'orig_iata', 'departure'])),
    destination: toNullableString(pickFirst(source, ['destination', 'dest_iata', 'arrival'])),
    originCountry: toNullableString(pickFirst(source, ['origin_country', 'country'])),
    onGround,
    lat: toNullableNumber(pickFirst(source, ['latitude', 'lat'])),
    lon: toNullableNumber(pickFirst(source, ['longitude', 'lon', 'lng'])),
    altitudeM: altitude.altitudeM,
    headingDeg: toNullableNumber(pickFirst(source, ['true_track', 'track', 'heading'])),
    speedMps: readSpeed(source),
    verticalRateMps: toNullableNumber(pickFirst(source, ['vertical_rate', 'vertical_rate_mps'])),
    upstreamStatus: toNullableString(source['status']),
    timestamp: toNullableDate(
      pickFirst(source, ['time_position', 'last_contact', 'timestamp', 'last_updated']),
    ),
  };
};

const extractFields = (flightId: string, payload: unknown): DetailFields => {
  if (!isRecord(payload)) {
    throw validationError(flightId, 'expected a JSON object');
  }

  if ('states' in payload) {
    const envelope = statesEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw validationError(flightId, 'states envelope does not match the expected shape');
    }

    const state = (envelope.data.states ?? []).find(
      (entry): entry is unknown[] =>
        Array.isArray(entry) && normalizeFlightId(entry[STATE.icao24]) === flightId,
    );

    if (!state) {
      throw new FlightSyncError('NotFound', `Flight ${flightId} is no longer tracked upstream`);
    }

    if (state.length < MIN_STATE_VECTOR_LENGTH) {
      throw validationError(flightId, `state vector has ${state.length} fields`);
    }

    return fromStateVector(state, toNullableDate(envelope.data.time));
  }

  const aircraft = payload['aircraft'];

  return fromFlatObject(flightId, isRecord(aircraft) ? aircraft : payload);
};

const resolveStatus = (fields: DetailFields): FlightStatus => {
  const declared = STATUS_ALIASES.get(fields.upstreamStatus?.toLowerCase() ?? '');
  if (declared) {
    return declared;
  }

  if (fields.onGround === null) {
    return 'unknown';
  }

  return fields.onGround ? 'landed' : 'airborne';
};

const computeSourceVersion = (record: Omit<FlightRecord, 'sourceVersion'>): string =>
  createHash('sha1')
    .update(
      JSON.stringify([
        record.flightId,
        record.callsign,
        record.origin,
        record.destination,
        record.originCountry,
        record.onGround,
        record.position,
        record.status,
        record.lastUpdated.toISOString(),
      ]),
    )
    .digest('hex')
    .slice(0, 16);

export const normalizeFlightDetail = (
  flightId: string,
  payload: unknown,
  now: Date = new Date(),
): FlightRecord => {
  const fields = extractFields(flightId, payload);

  if (fields.lat !== null && (fields.lat < -90 || fields.lat > 90)) {
    throw validationError(flightId, `latitude ${fields.lat} is out of range`);
  }

  if (fields.lon !== null && (fields.lon < -180 || fields.lon > 180)) {
    throw validationError(flightId, `longitude ${fields.lon} is out of range`);
  }

  const record: Omit<FlightRecord, 'sourceVersion'> = {
    flightId,
    callsign: fields.callsign,
    origin: fields.origin ? fields.origin.toUpperCase() : null,
    destination: fields.destination ? fields.destination.toUpperCase() : null,
    originCountry: fields.originCountry,
    onGround: fields.onGround,
    position: {
      lat: fields.lat,
      lon: fields.lon,
      altitudeM: fields.altitudeM,
      headingDeg: fields.headingDeg,
      speedMps: fields.speedMps,
      verticalRateMps: fields.verticalRateMps,
    },
    status: resolveStatus(fields),
    lastUpdated: fields.timestamp ?? now,
    lastUpdatedSource: fields.timestamp ? 'upstream' : 'local',
  };

  return { ...record, sourceVersion: computeSourceVersion(record) };
};
