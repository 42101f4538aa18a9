/**
 * uartsim: dual-clock UART simulator
 *
 * Usage:
 *   ./node_modules/.bin/esbuild --bundle uartsim.ts --platform=node --format=esm | node --input-type=module - "hello"
 *   # or: npm run sim -- "hello"
 *
 * Sends the given text (or --hex bytes) through a UART in loopback, or from
 * one UART to a second one with --duplex, and checks what comes back.
 *
 * Options:
 *   --verbose          Show per-byte timing and final status
 *   --trace            Show TX line transitions
 *   --json             Output the result as JSON
 *   --quiet            Only show errors
 *   --duplex           Two cores, cross-connected, sending both ways
 *   --hex=41,42,ff     Send these bytes instead of text
 *   --baud=N           Baud rate (sets BAUD_DIV from the wire clock)
 *   --divisor=N        BAUD_DIV value (overrides --baud)
 *   --control-hz=N     Control clock (default 50000000)
 *   --wire-hz=N        Wire clock (default 7372800)
 *   --depth=N          Buffer depth per direction (default 8)
 *   --stages=N         Synchronizer stages (default 2)
 */
import { baudDivisor, DEFAULT_BAUD_DIVISOR, DEFAULT_FIFO_DEPTH, DEFAULT_SYNC_STAGES, REFERENCE_WIRE_CLOCK_HZ } from './src/core/constants';
import { ClockScheduler } from './src/core/scheduler';
import { UartSystem, DEFAULT_CONTROL_CLOCK_HZ } from './src/host/uart-system';

// ---- Argument parsing ----

const args = process.argv.slice(2);
const flags = new Set(args.filter(a => a.startsWith('--') && !a.includes('=')));
const options = new Map<string, string>();
for (const arg of args) {
  const eq = arg.indexOf('=');
  if (arg.startsWith('--') && eq > 0) options.set(arg.slice(2, eq), arg.slice(eq + 1));
}
const positional = args.filter(a => !a.startsWith('--'));

function usage(): never {
  console.error('uartsim: dual-clock UART simulator');
  console.error('');
  console.error('Usage: uartsim <text> [options]   or   uartsim --hex=41,42 [options]');
  console.error('');
  console.error('Options:');
  console.error('  --verbose        Show per-byte timing and final status');
  console.error('  --trace          Show TX line transitions');
  console.error('  --json           Output the result as JSON');
  console.error('  --quiet          Only show errors');
  console.error('  --duplex         Two cores, cross-connected');
  console.error('  --baud=N | --divisor=N | --control-hz=N | --wire-hz=N | --depth=N | --stages=N');
  process.exit(1);
}

function numberOption(name: string, fallback: number): number {
  const raw = options.get(name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.error(`Error: --${name} needs a positive number, got '${raw}'`);
    process.exit(1);
  }
  return value;
}

function parseHex(raw: string): number[] {
  return raw.split(',').filter(s => s.length > 0).map(s => {
    const value = parseInt(s, 16);
    if (Number.isNaN(value) || value < 0 || value > 0xFF) {
      console.error(`Error: '${s}' is not a byte`);
      process.exit(1);
    }
    return value;
  });
}

const hex = options.get('hex');
if (positional.length === 0 && hex === undefined) usage();

const payload = hex !== undefined ? parseHex(hex) : Array.from(Buffer.from(positional.join(' '), 'utf-8'));
const verbose = flags.has('--verbose');
const trace = flags.has('--trace');
const jsonOut = flags.has('--json');
const quiet = flags.has('--quiet');
const duplex = flags.has('--duplex');

const controlHz = numberOption('control-hz', DEFAULT_CONTROL_CLOCK_HZ);
const wireHz = numberOption('wire-hz', REFERENCE_WIRE_CLOCK_HZ);
const fifoDepth = numberOption('depth', DEFAULT_FIFO_DEPTH);
const syncStages = numberOption('stages', DEFAULT_SYNC_STAGES);

let divisor = DEFAULT_BAUD_DIVISOR;
try {
  if (options.has('divisor')) divisor = numberOption('divisor', DEFAULT_BAUD_DIVISOR);
  else if (options.has('baud')) divisor = baudDivisor(numberOption('baud', 115200), wireHz);
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

// ---- Build ----

const scheduler = new ClockScheduler();

function build(): [UartSystem, UartSystem | null] {
  const coreOptions = { controlClockHz: controlHz, wireClockHz: wireHz, fifoDepth, syncStages, scheduler };
  const a = new UartSystem({ ...coreOptions, name: 'a' });
  if (!duplex) {
    a.loopback();
    return [a, null];
  }
  const b = new UartSystem({ ...coreOptions, name: 'b' });
  a.connectRx(() => b.core.txLine);
  b.connectRx(() => a.core.txLine);
  return [a, b];
}

let systems: [UartSystem, UartSystem | null];
try {
  systems = build();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
const [local, remote] = systems;

// ---- Run ----

interface Transfer {
  from: string;
  to: string;
  sent: number[];
  received: number[];
  ok: boolean;
}

const transfers: Transfer[] = [];
const started = performance.now();

try {
  local.configure({ divisor });
  remote?.configure({ divisor });

  if (remote === null) {
    // One buffer's worth at a time, so the RX side never overruns.
    const received: number[] = [];
    for (let i = 0; i < payload.length; i += fifoDepth) {
      const chunk = payload.slice(i, i + fifoDepth);
      local.send(chunk);
      const got = local.receive(chunk.length);
      if (verbose && !quiet && !jsonOut) {
        console.log(`  t=${(scheduler.now / 1000).toFixed(2)}us  rx ${hexBytes(got)}`);
      }
      received.push(...got);
    }
    transfers.push({ from: local.name, to: local.name, sent: payload, received, ok: sameBytes(payload, received) });
  } else {
    const reversed = [...payload].reverse();
    const toRemote: number[] = [];
    const toLocal: number[] = [];
    for (let i = 0; i < payload.length; i++) {
      local.send([payload[i]]);
      remote.send([reversed[i]]);
      toRemote.push(...remote.receive(1));
      toLocal.push(...local.receive(1));
    }
    transfers.push({ from: local.name, to: remote.name, sent: payload, received: toRemote, ok: sameBytes(payload, toRemote) });
    transfers.push({ from: remote.name, to: local.name, sent: reversed, received: toLocal, ok: sameBytes(reversed, toLocal) });
  }
  local.waitTxIdle();
  remote?.waitTxIdle();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

const elapsed = performance.now() - started;
const ok = transfers.every(t => t.ok);

function sameBytes(a: number[], b: number[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function hexBytes(bytes: number[]): string {
  return bytes.map(b => b.toString(16).padStart(2, '0')).join(' ');
}

// ---- Output ----

const cores = remote === null ? [local] : [local, remote];

if (jsonOut) {
  console.log(JSON.stringify({
    ok,
    divisor,
    simulatedNS: scheduler.now,
    transfers,
    cores: cores.map(s => ({
      name: s.name,
      snapshot: s.core.getSnapshot(),
      overruns: s.core.overruns,
      txDropped: s.core.txDropped,
      transitions: trace ? s.txTrace.transitions() : undefined,
    })),
  }, null, 2));
  process.exit(ok ? 0 : 1);
}

if (trace && !quiet) {
  for (const s of cores) {
    console.log(`\n=== ${s.name} TX line (${s.txTrace.length} transitions, ${s.ticksPerBit} ticks/bit) ===`);
    for (const t of s.txTrace.transitions()) {
      console.log(`  ${String(t.tick).padStart(8)}  ${t.level}`);
    }
  }
}

if (verbose && !quiet) {
  for (const s of cores) {
    const snap = s.core.getSnapshot();
    console.log(`\n=== ${s.name} ===`);
    console.log(`  control ticks: ${snap.controlTicks}  wire ticks: ${snap.wireTicks}`);
    console.log(`  status: ${JSON.stringify(snap.status)}`);
    console.log(`  INT_STATUS: 0x${snap.intStatus.toString(16)}  overruns: ${s.core.overruns}  dropped: ${s.core.txDropped}`);
  }
}

for (const t of transfers) {
  if (t.ok) {
    if (!quiet) console.log(`  ${t.from} -> ${t.to}: ${t.received.length} bytes OK`);
  } else {
    console.error(`  ${t.from} -> ${t.to}: MISMATCH`);
    console.error(`    sent:     ${hexBytes(t.sent)}`);
    console.error(`    received: ${hexBytes(t.received)}`);
  }
}

if (!quiet) {
  console.log(`  divisor ${divisor}, ${(scheduler.now / 1e6).toFixed(3)} ms simulated in ${elapsed.toFixed(0)} ms`);
}

process.exit(ok ? 0 : 1);
