import { systemClock, type Clock } from "../core/clock";
import { env } from "../core/config";
import { logger as rootLogger, type Logger } from "../core/logger";
import { createRng, type Rng } from "../core/random";
import type { CommonRunConfig, WorkflowType } from "../domain/models";
import type { InteractionLedger, ProfileSink, SessionStore } from "../domain/ports";
import type { ScreenStateProvider } from "../platforms/screen";
import { DeviceSession } from "../services/device-session";
import { LedgerGateway } from "../services/ledger-gateway";
import { ActionEngine, type EngagementSettings } from "./capabilities/action-engine";
import { NavigationFlows } from "./capabilities/flows";
import { Navigator } from "./capabilities/navigator";
import { PacingController } from "./capabilities/pacing";
import { PageDetector } from "./capabilities/page-detector";
import { PopupHandler } from "./capabilities/popup-handler";
import { RecoverySupervisor } from "./capabilities/recovery";
import { TargetReader } from "./capabilities/target-reader";
import { SafeEvents, type WorkflowEvents } from "./events";
import { WorkflowStats } from "./stats";

export interface EngineTimings {
  defaultTimeoutMs: number;
  pollIntervalMs: number;
  probeTimeoutMs: number;
  recoverySettleMs: number;
  navigationRetries: number;
}

export interface WorkflowDependencies {
  provider: ScreenStateProvider;
  ledger: InteractionLedger;
  accountId: number;
  sessions?: SessionStore;
  profiles?: ProfileSink;
  clock?: Clock;
  /** Overrides the config seed; mostly for tests. */
  rng?: Rng;
  events?: WorkflowEvents;
  logger?: Logger;
  timings?: Partial<EngineTimings>;
}

export function defaultTimings(): EngineTimings {
  return {
    defaultTimeoutMs: env.WORKFLOW_DEFAULT_TIMEOUT_MS,
    pollIntervalMs: env.WORKFLOW_POLL_INTERVAL_MS,
    probeTimeoutMs: 500,
    recoverySettleMs: env.WORKFLOW_RECOVERY_SETTLE_MS,
    navigationRetries: 2,
  };
}

/** Capabilities shared by one workflow run. Built fresh per run. */
export interface WorkflowContext {
  workflow: WorkflowType;
  accountId: number;
  clock: Clock;
  rng: Rng;
  log: Logger;
  stats: WorkflowStats;
  events: SafeEvents;
  device: DeviceSession;
  detector: PageDetector;
  popups: PopupHandler;
  navigator: Navigator;
  flows: NavigationFlows;
  reader: TargetReader;
  pacing: PacingController;
  recovery: RecoverySupervisor;
  ledger: LedgerGateway;
  profiles: ProfileSink | null;
}

export function createWorkflowContext(
  deps: WorkflowDependencies,
  workflow: WorkflowType,
  config: CommonRunConfig
): WorkflowContext {
  const clock = deps.clock ?? systemClock;
  const rng = deps.rng ?? createRng(config.seed);
  const log = (deps.logger ?? rootLogger).child({ workflow, accountId: deps.accountId });
  const timings = { ...defaultTimings(), ...deps.timings };

  const stats = new WorkflowStats(clock);
  const events = new SafeEvents(deps.events ?? {}, log);
  const device = new DeviceSession(deps.provider, clock, log, { defaultTimeoutMs: timings.defaultTimeoutMs });
  const detector = new PageDetector(device, undefined, timings.probeTimeoutMs);
  const popups = new PopupHandler(device, stats, log);
  const navigator = new Navigator(device, detector, popups, clock, log, {
    defaultTimeoutMs: timings.defaultTimeoutMs,
    pollIntervalMs: timings.pollIntervalMs,
    defaultMaxRetries: timings.navigationRetries,
  });
  const reader = new TargetReader(device, timings.probeTimeoutMs);
  const flows = new NavigationFlows(navigator, device, reader, log);
  const pacing = new PacingController(config, clock, rng, events, log);
  const recovery = new RecoverySupervisor(device, popups, clock, rng, stats, log, {
    stuckThreshold: config.stuckThreshold,
    settleMs: timings.recoverySettleMs,
  });
  const ledger = new LedgerGateway(deps.ledger, deps.accountId, stats, log);

  return {
    workflow,
    accountId: deps.accountId,
    clock,
    rng,
    log,
    stats,
    events,
    device,
    detector,
    popups,
    navigator,
    flows,
    reader,
    pacing,
    recovery,
    ledger,
    profiles: deps.profiles ?? null,
  };
}

export function createActionEngine(ctx: WorkflowContext, settings: EngagementSettings): ActionEngine {
  return new ActionEngine(settings, ctx.rng, ctx.stats, ctx.ledger, ctx.pacing, ctx.events, ctx.log);
}
