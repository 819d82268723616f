import "dotenv/config";
import { Command } from "commander";
import { createLogger } from "@teststand/shared/utils";
import {
  ConfigurationError,
  createTelemetry,
  loadTelemetryConfig,
  type SensorReading,
  type Telemetry,
} from "@teststand/telemetry";

const logger = createLogger("soak");

// ---------------------------------------------------------------------------
// Simulated sensors
// ---------------------------------------------------------------------------

interface SimulatedSensor {
  sensorId: string;
  sensorName: string;
  unit: string;
  warningValue: number;
  dangerValue: number;
  /** centre of the sine sweep */
  base: number;
  /** amplitude of the sine sweep */
  swing: number;
}

const SENSORS: SimulatedSensor[] = [
  { sensorId: "pt-chamber", sensorName: "Chamber Pressure", unit: "psi", warningValue: 500, dangerValue: 800, base: 450, swing: 400 },
  { sensorId: "pt-ox-tank", sensorName: "Oxidizer Tank Pressure", unit: "psi", warningValue: 700, dangerValue: 900, base: 550, swing: 200 },
  { sensorId: "tc-nozzle", sensorName: "Nozzle Temperature", unit: "C", warningValue: 900, dangerValue: 1200, base: 700, swing: 450 },
  { sensorId: "lc-thrust", sensorName: "Thrust Load Cell", unit: "lbf", warningValue: 4000, dangerValue: 5000, base: 2500, swing: 1500 },
];

const WATCHDOG = "acquisition";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface SoakOptions {
  duration: string;
  rate: string;
  logDir?: string;
  freezeAfter?: string;
  faultRate: string;
}

interface SoakSettings {
  durationSeconds: number;
  rateHz: number;
  freezeAfterSeconds: number | null;
  faultRate: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseSettings(opts: SoakOptions): SoakSettings {
  const issues: string[] = [];
  const positive = (flag: string, raw: string): number => {
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0) issues.push(`${flag} must be a positive number (got ${raw})`);
    return value;
  };

  const durationSeconds = positive("--duration", opts.duration);
  const rateHz = positive("--rate", opts.rate);
  const freezeAfterSeconds = opts.freezeAfter === undefined ? null : positive("--freeze-after", opts.freezeAfter);

  const faultRate = Number(opts.faultRate);
  if (!Number.isFinite(faultRate) || faultRate < 0 || faultRate > 1) {
    issues.push(`--fault-rate must be between 0 and 1 (got ${opts.faultRate})`);
  }

  if (issues.length > 0) throw new ConfigurationError(issues);
  return { durationSeconds, rateHz, freezeAfterSeconds, faultRate };
}

function sampleSensors(tick: number): SensorReading[] {
  return SENSORS.map((s, i) => ({
    sensorId: s.sensorId,
    sensorName: s.sensorName,
    unit: s.unit,
    warningValue: s.warningValue,
    dangerValue: s.dangerValue,
    value: Math.round((s.base + s.swing * Math.sin(tick / 25 + i)) * 100) / 100,
  }));
}

/** One simulated serial exchange; throws on an injected fault. */
function readFrame(telemetry: Telemetry, tick: number, settings: SoakSettings): SensorReading[] {
  const { comm } = telemetry;
  comm.logSent("READ\r\n", "READ");

  if (Math.random() < settings.faultRate) {
    comm.logTimeout(1 / settings.rateHz, `tick ${tick}`);
    throw new Error(`Simulated read timeout on tick ${tick}`);
  }

  const readings = sampleSensors(tick);
  const payload = Object.fromEntries(readings.map((r) => [r.sensorId, r.value]));
  comm.logReceived(`${JSON.stringify(payload)}\n`, payload);
  return readings;
}

// ---------------------------------------------------------------------------
// Soak run
// ---------------------------------------------------------------------------

async function soak(opts: SoakOptions): Promise<void> {
  let telemetry: Telemetry;
  let settings: SoakSettings;

  try {
    settings = parseSettings(opts);
    const config = loadTelemetryConfig();
    telemetry = createTelemetry(opts.logDir ? { ...config, logDir: opts.logDir } : config);
    telemetry.start();
  } catch (err) {
    logger.fatal({ err }, "Telemetry setup failed");
    process.exit(1);
  }

  const { freeze, performance, recorder, recovery, router } = telemetry;
  const intervalMs = 1000 / settings.rateHz;
  const watchdogTimeout = Math.max(2, telemetry.config.minHeartbeatIntervalSeconds * 2);

  freeze.register(WATCHDOG, watchdogTimeout);
  freeze.onFreeze((component, seconds) => {
    console.log(`  !! ${component} frozen for ${seconds}s`);
  });
  recorder.recordModeChange("idle", "simulator", "soak run");

  let stopping = false;
  process.once("SIGINT", () => {
    stopping = true;
  });

  console.log("=== Telemetry Soak ===\n");
  console.log(`  Run:          ${router.currentRun().directory}`);
  console.log(`  Duration:     ${settings.durationSeconds}s`);
  console.log(`  Rate:         ${settings.rateHz} Hz`);
  console.log(`  Fault rate:   ${settings.faultRate}`);
  console.log(`  Freeze after: ${settings.freezeAfterSeconds ?? "never"}\n`);

  const startedAt = Date.now();
  let tick = 0;
  let failedReads = 0;
  let lastTickAt: number | null = null;

  while (!stopping && Date.now() - startedAt < settings.durationSeconds * 1000) {
    tick++;
    const tickAt = Date.now();
    if (lastTickAt !== null) {
      performance.recordDataLag(Math.max(0, tickAt - lastTickAt - intervalMs));
    }
    lastTickAt = tickAt;
    const elapsedSeconds = (tickAt - startedAt) / 1000;
    if (settings.freezeAfterSeconds === null || elapsedSeconds < settings.freezeAfterSeconds) {
      freeze.heartbeat(WATCHDOG);
    }

    const currentTick = tick;
    const outcome = await recovery.retryWithBackoff(
      () => performance.measure("read_frame", () => readFrame(telemetry, currentTick, settings)),
      "timeout",
      { port: "simulator" },
    );

    if (outcome.ok) {
      recorder.checkThresholds(outcome.value);
      const raw = Object.fromEntries(outcome.value.map((r) => [r.sensorId, r.value]));
      router.logData({ ts: elapsedSeconds, raw, adjusted: raw, offsets: {} });
      freeze.logOperation("read_frame", { tick: currentTick });
    } else {
      failedReads++;
    }

    await sleep(intervalMs);
  }

  const health = telemetry.getHealth();
  console.log(`\n=== Soak Complete ===`);
  console.log(`  Ticks:          ${tick}`);
  console.log(`  Failed reads:   ${failedReads}`);
  console.log(`  Freezes:        ${health.freeze.statistics.freezesDetected}`);
  console.log(`  Healthy:        ${health.healthy}\n`);
  console.log(JSON.stringify(health, null, 2));

  const clean = await telemetry.stop();
  if (!clean) {
    logger.error("Telemetry did not shut down cleanly");
    process.exitCode = 1;
  }
}

// ---------------------------------------------------------------------------
// CLI
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("soak")
  .description("Drive a synthetic acquisition loop against the telemetry subsystem")
  .option("--duration <seconds>", "How long to run", "30")
  .option("--rate <hz>", "Acquisition loop frequency", "10")
  .option("--log-dir <dir>", "Parent directory for run directories (overrides TELEMETRY_LOG_DIR)")
  .option("--freeze-after <seconds>", "Stop heartbeating after this many seconds to provoke a freeze")
  .option("--fault-rate <ratio>", "Probability that a serial read times out", "0.05")
  .action(async (opts: SoakOptions) => {
    await soak(opts);
  });

await program.parseAsync();
