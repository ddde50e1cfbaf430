/**
 * Topology repository
 *
 * Loads the complete station / line / transfer / fare data set from Postgres for a
 * snapshot rebuild. Rows are validated with zod; NUMERIC columns arrive as strings
 * from pg and are coerced. Any malformed row fails the whole load with an IntegrityError.
 */

import { z } from 'zod';
import { IntegrityError } from '../engine/errors.js';
import type { FareRuleSet, GroupDiscountBracket, PassengerType } from '../types/fare.js';
import { PASSENGER_CATEGORIES } from '../types/fare.js';
import type { Line, LineHop, Station, TransferLink } from '../types/network.js';
import type { TopologyData } from '../types/topology.js';

export interface TopologyProvider {
  load(): Promise<TopologyData>;
}

/**
 * Query surface the repository needs; a pg Pool satisfies it
 */
export interface Queryable {
  query(text: string): Promise<{ rows: unknown[] }>;
}

const id = z.coerce.string().min(1);
const num = z.coerce.number();
const optionalNum = z.union([z.null(), z.coerce.number()]);

const stationRow = z.object({
  id,
  name: z.string(),
  lat: num,
  lon: num,
  zone_number: z.coerce.number().int(),
  is_interchange: z.boolean(),
  line_id: id,
});

const lineRow = z.object({
  id,
  company_id: id,
  name: z.string(),
  color: z.string().nullable(),
  status: z.enum(['active', 'maintenance', 'inactive']),
});

const lineStationRow = z.object({
  line_id: id,
  station_id: id,
  sequence: z.coerce.number().int(),
  travel_time_minutes: optionalNum,
  distance_km: optionalNum,
  base_cost: optionalNum,
});

const transferLinkRow = z.object({
  id,
  station_a_id: id,
  station_b_id: id,
  walking_time_minutes: num,
  walking_distance_meters: num,
  transfer_fee: num,
  is_active: z.boolean(),
});

const fareRuleRow = z.object({
  line_id: id,
  pricing: z.enum(['zone', 'station']),
  zone_number: z.coerce.number().int(),
  base_fare: num,
  incremental_fare: num,
});

const passengerTypeRow = z.object({
  category: z.enum(PASSENGER_CATEGORIES),
  discount_percentage: num,
  age_min: z.coerce.number().int().nullable(),
  age_max: z.coerce.number().int().nullable(),
});

const groupDiscountRow = z.object({
  min_size: z.coerce.number().int(),
  discount_percentage: num,
});

function parseRows<T>(table: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[], issues: string[]): T[] {
  const parsed: T[] = [];
  rows.forEach((row, i) => {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      const detail = result.error.errors
        .map((err) => `${err.path.join('.')}: ${err.message}`)
        .join(', ');
      issues.push(`${table} row ${i + 1} is malformed (${detail})`);
    }
  });
  return parsed;
}

type LineStationRow = z.infer<typeof lineStationRow>;

function assembleLines(
  lines: z.infer<typeof lineRow>[],
  lineStations: LineStationRow[],
  issues: string[]
): Line[] {
  const byLine = new Map<string, LineStationRow[]>();
  for (const row of lineStations) {
    const list = byLine.get(row.line_id) ?? [];
    list.push(row);
    byLine.set(row.line_id, list);
  }

  return lines.map((line) => {
    const stops = (byLine.get(line.id) ?? []).sort((a, b) => a.sequence - b.sequence);
    const hops: LineHop[] = [];

    stops.slice(0, -1).forEach((stop) => {
      if (stop.travel_time_minutes === null || stop.distance_km === null || stop.base_cost === null) {
        issues.push(`line ${line.id} has no hop weights after station ${stop.station_id}`);
        return;
      }
      hops.push({
        travelTimeMinutes: stop.travel_time_minutes,
        distanceKm: stop.distance_km,
        baseCost: stop.base_cost,
      });
    });

    return {
      id: line.id,
      companyId: line.company_id,
      name: line.name,
      color: line.color,
      status: line.status,
      stationIds: stops.map((stop) => stop.station_id),
      hops,
    };
  });
}

function assembleFareRules(rows: z.infer<typeof fareRuleRow>[], issues: string[]): FareRuleSet[] {
  const byLine = new Map<string, FareRuleSet>();

  for (const row of rows) {
    const ruleSet = byLine.get(row.line_id);
    const zoneFare = { zone: row.zone_number, baseFare: row.base_fare, incrementalFare: row.incremental_fare };

    if (!ruleSet) {
      byLine.set(row.line_id, { lineId: row.line_id, pricing: row.pricing, zones: [zoneFare] });
    } else if (ruleSet.pricing !== row.pricing) {
      issues.push(`line ${row.line_id} mixes ${ruleSet.pricing} and ${row.pricing} pricing`);
    } else {
      ruleSet.zones.push(zoneFare);
    }
  }

  return [...byLine.values()];
}

export class TopologyRepository implements TopologyProvider {
  constructor(private readonly db: Queryable, private readonly schema: string = 'route_engine') {}

  /**
   * @throws IntegrityError if any row is malformed
   */
  async load(): Promise<TopologyData> {
    const s = this.schema;
    const [stations, lines, lineStations, transferLinks, fareRules, passengerTypes, groupDiscounts] =
      await Promise.all([
        this.db.query(`SELECT id, name, lat, lon, zone_number, is_interchange, line_id FROM ${s}.stations ORDER BY id`),
        this.db.query(`SELECT id, company_id, name, color, status FROM ${s}.lines ORDER BY id`),
        this.db.query(
          `SELECT line_id, station_id, sequence, travel_time_minutes, distance_km, base_cost
           FROM ${s}.line_stations ORDER BY line_id, sequence`
        ),
        this.db.query(
          `SELECT id, station_a_id, station_b_id, walking_time_minutes, walking_distance_meters, transfer_fee, is_active
           FROM ${s}.transfer_links ORDER BY id`
        ),
        this.db.query(
          `SELECT line_id, pricing, zone_number, base_fare, incremental_fare
           FROM ${s}.fare_rules ORDER BY line_id, zone_number`
        ),
        this.db.query(`SELECT category, discount_percentage, age_min, age_max FROM ${s}.passenger_types ORDER BY category`),
        this.db.query(`SELECT min_size, discount_percentage FROM ${s}.group_discounts ORDER BY min_size`),
      ]);

    const issues: string[] = [];

    const stationRows = parseRows('stations', stationRow, stations.rows, issues);
    const lineRows = parseRows('lines', lineRow, lines.rows, issues);
    const lineStationRows = parseRows('line_stations', lineStationRow, lineStations.rows, issues);
    const linkRows = parseRows('transfer_links', transferLinkRow, transferLinks.rows, issues);
    const fareRows = parseRows('fare_rules', fareRuleRow, fareRules.rows, issues);
    const passengerRows = parseRows('passenger_types', passengerTypeRow, passengerTypes.rows, issues);
    const groupRows = parseRows('group_discounts', groupDiscountRow, groupDiscounts.rows, issues);

    const data: TopologyData = {
      stations: stationRows.map(
        (row): Station => ({
          id: row.id,
          name: row.name,
          lat: row.lat,
          lon: row.lon,
          zone: row.zone_number,
          isInterchange: row.is_interchange,
          lineId: row.line_id,
        })
      ),
      lines: assembleLines(lineRows, lineStationRows, issues),
      transferLinks: linkRows.map(
        (row): TransferLink => ({
          id: row.id,
          stationAId: row.station_a_id,
          stationBId: row.station_b_id,
          walkingTimeMinutes: row.walking_time_minutes,
          walkingDistanceMeters: row.walking_distance_meters,
          transferFee: row.transfer_fee,
          isActive: row.is_active,
        })
      ),
      fareRules: assembleFareRules(fareRows, issues),
      passengerTypes: passengerRows.map(
        (row): PassengerType => ({
          category: row.category,
          discountPercent: row.discount_percentage,
          ageMin: row.age_min,
          ageMax: row.age_max,
        })
      ),
      groupDiscounts: groupRows.map(
        (row): GroupDiscountBracket => ({ minSize: row.min_size, discountPercent: row.discount_percentage })
      ),
    };

    if (issues.length > 0) {
      throw new IntegrityError(issues);
    }
    return data;
  }
}
