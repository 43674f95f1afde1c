import { NextRequest, NextResponse } from 'next/server';
import { loadEngineConfig } from '@/lib/config';
import { ValidationError, errorMessage } from '@/lib/errors';
import { runSnapshotBatch } from '@/lib/climate/snapshots';
import {
  createSupabaseObservationStore,
  createSupabaseStatisticsWriter,
  getServerClient,
} from '@/lib/supabase';

function parseIntegerParam(params: URLSearchParams, name: string): number | undefined {
  const raw = params.get(name);
  if (raw === null || raw.trim() === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ValidationError(`${name} must be an integer, got "${raw}"`);
  }
  return parsed;
}

export function parseBatchParams(params: URLSearchParams, defaults = loadEngineConfig()) {
  return {
    stationId: params.get('station_id')?.trim() || defaults.defaultStationId,
    windowRadius: parseIntegerParam(params, 'radius') ?? defaults.windowRadius,
    startYear: parseIntegerParam(params, 'start_year'),
    endYear: parseIntegerParam(params, 'end_year'),
    minYears: defaults.minYears,
  };
}

// Rebuilds one station's daily statistics snapshot. Triggered by cron after
// each raw-observation reload; protected by CRON_SECRET.
export async function GET(request: NextRequest) {
  const authHeader = request.headers.get('authorization');
  const { searchParams } = new URL(request.url);
  const querySecret = searchParams.get('secret');

  const expectedSecret = process.env.CRON_SECRET;
  const providedSecret = authHeader?.replace('Bearer ', '') || querySecret;

  if (!expectedSecret || providedSecret !== expectedSecret) {
    return NextResponse.json({ error: 'Unauthorized' }, { status: 401 });
  }

  try {
    const { stationId, ...options } = parseBatchParams(searchParams);
    const client = getServerClient();
    const result = await runSnapshotBatch(
      stationId,
      {
        store: createSupabaseObservationStore(client),
        writer: createSupabaseStatisticsWriter(client),
      },
      options
    );

    return NextResponse.json({ ...result, timestamp: new Date().toISOString() });
  } catch (error) {
    const status = error instanceof ValidationError ? 400 : 500;
    if (status === 500) {
      console.error('Snapshot batch failed:', error);
    }
    return NextResponse.json(
      {
        ok: false,
        error: errorMessage(error),
        timestamp: new Date().toISOString(),
      },
      { status }
    );
  }
}
