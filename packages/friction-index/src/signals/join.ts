/**
 * Explicit join of the three observation tables by (state, district, period)
 *
 * Full outer join: every key present in at least one table produces one
 * JoinedObservation. A table without a row for the key contributes zero
 * counts and is left out of `sources`.
 */

import { compareGeoPeriodKeys, geoPeriodId } from '../core/utils/keys.js';
import type {
  GeoPeriodKey,
  JoinedObservation,
  ObservationTable,
  ObservationTables,
} from '../core/types/index.js';

interface MutableJoin {
  key: GeoPeriodKey;
  sources: ObservationTable[];
  biometricUpdates: number;
  biometricFailures: number;
  biometricRetries: number;
  demographicUpdates: number;
  addressUpdates: number;
  nameUpdates: number;
  dobUpdates: number;
  enrolments: number;
}

function emptyJoin(key: GeoPeriodKey): MutableJoin {
  return {
    key: { state: key.state, district: key.district, period: key.period },
    sources: [],
    biometricUpdates: 0,
    biometricFailures: 0,
    biometricRetries: 0,
    demographicUpdates: 0,
    addressUpdates: 0,
    nameUpdates: 0,
    dobUpdates: 0,
    enrolments: 0,
  };
}

/**
 * Join the three tables into one row per key, sorted by key
 */
export function joinObservations(tables: ObservationTables): JoinedObservation[] {
  const joined = new Map<string, MutableJoin>();

  const entryFor = (key: GeoPeriodKey, source: ObservationTable): MutableJoin => {
    const id = geoPeriodId(key);
    let entry = joined.get(id);
    if (!entry) {
      entry = emptyJoin(key);
      joined.set(id, entry);
    }
    entry.sources.push(source);
    return entry;
  };

  for (const row of tables.biometric) {
    const entry = entryFor(row, 'biometric');
    entry.biometricUpdates = row.biometric_update_count;
    entry.biometricFailures = row.biometric_failure_count;
    entry.biometricRetries = row.biometric_retry_count;
  }

  for (const row of tables.demographic) {
    const entry = entryFor(row, 'demographic');
    entry.demographicUpdates = row.demographic_update_count;
    entry.addressUpdates = row.address_updates;
    entry.nameUpdates = row.name_updates;
    entry.dobUpdates = row.dob_updates;
  }

  for (const row of tables.enrolment) {
    const entry = entryFor(row, 'enrolment');
    entry.enrolments = row.enrolment_count;
  }

  return [...joined.values()]
    .sort((a, b) => compareGeoPeriodKeys(a.key, b.key))
    .map((entry) => ({ ...entry, sources: [...entry.sources] }));
}
