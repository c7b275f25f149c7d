/**
 * Simulate Call Traffic
 *
 * Fires a burst of call events at a running router and prints the
 * resulting analytics:
 * - ZIPs drawn from every tier's data file plus a few unknown ZIPs
 * - Random caller ids
 *
 * Point BID_API_BASE at a stub (or leave it unreachable) unless you want
 * real bid requests to go out.
 *
 * Run: npm run simulate:calls -- [count]
 */

import { Value } from '@sinclair/typebox/value';
import { AnalyticsResponseSchema, CallEventResponseSchema } from '../src/api/schemas';

const API_BASE = process.env.API_BASE || 'http://localhost:5000';

const SAMPLE_ZIPS = ['10001', '10002', '02134', '30301', '30302', '60601', '94105'];
const UNKNOWN_ZIPS = ['00000', '99999'];

function log(emoji: string, message: string) {
  console.log(`${emoji}  ${message}`);
}

function randomCaller(): string {
  const digits = Array.from({ length: 10 }, () => Math.floor(Math.random() * 10)).join('');
  return `+1${digits}`;
}

function pickZip(): string {
  // ~1 in 10 calls from a ZIP no tier owns
  const pool = Math.random() < 0.1 ? UNKNOWN_ZIPS : SAMPLE_ZIPS;
  return pool[Math.floor(Math.random() * pool.length)];
}

async function waitForServer(maxAttempts = 30): Promise<boolean> {
  log('...', 'Waiting for server...');

  for (let i = 0; i < maxAttempts; i++) {
    try {
      const response = await fetch(`${API_BASE}/health`);
      if (response.ok) {
        log('OK', 'Server is ready');
        return true;
      }
    } catch {
      // Server not ready
    }
    await new Promise((r) => setTimeout(r, 500));
  }

  return false;
}

async function main() {
  const count = parseInt(process.argv[2] || '50', 10);

  console.log('\n========================================');
  console.log(`  SIMULATING ${count} CALL EVENTS`);
  console.log('========================================\n');

  const serverReady = await waitForServer();
  if (!serverReady) {
    console.error('Server not available. Run: npm run dev');
    process.exit(1);
  }

  const statuses = new Map<string, number>();

  for (let i = 0; i < count; i++) {
    const response = await fetch(`${API_BASE}/call-event`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ caller_id: randomCaller(), zip_code: pickZip() }),
    });

    if (!response.ok) {
      throw new Error(`Call event rejected: ${response.status}`);
    }

    const result: unknown = await response.json();
    if (!Value.Check(CallEventResponseSchema, result)) {
      throw new Error('Unexpected call event response');
    }
    statuses.set(result.status, (statuses.get(result.status) ?? 0) + 1);
  }

  for (const [status, n] of statuses) {
    log('OK', `${status}: ${n}`);
  }

  const analyticsRes = await fetch(`${API_BASE}/v1/analytics`);
  const body: unknown = await analyticsRes.json();
  if (!Value.Check(AnalyticsResponseSchema, body)) {
    throw new Error('Unexpected analytics response');
  }
  const { analytics } = body;

  console.log('\n========================================');
  log('OK', `Total calls recorded: ${analytics.total_calls}`);
  log('OK', `Successful bids: ${analytics.successful_calls}`);
  log('OK', `Routed via fallback: ${analytics.fallback_calls}`);
  console.log('========================================\n');
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
