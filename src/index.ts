/**
 * Portal Workflow Engine
 *
 * Drives one web portal through a remote browser:
 * - a pool of long-lived authenticated sessions shared across requests
 * - resumable multi-phase form submission with verified transitions
 * - convergence loading for virtualized lists
 * - milestone classification from a visual progress timeline
 */

export { PortalEngine, createPortalEngine } from './sdk.js';
export type {
  EngineResult,
  PortalEngineOptions,
  SessionRequest,
  BatchAcquireItem,
  BatchAcquireResult,
  BulkInfoRequest,
  BulkInfoResult,
  BulkItem,
  ImportContainerInfo,
  ExportContainerInfo,
} from './sdk.js';

// Core components
export { SessionPool, DEFAULT_SESSION_TTL_MS } from './core/session-pool.js';
export type { SessionPoolOptions } from './core/session-pool.js';
export { detectAuthenticationLoss, DEFAULT_AUTH_LOSS_PROBES } from './core/session-health.js';
export type { AuthLossProbe, AuthLossReport } from './core/session-health.js';
export { WorkflowEngine, validateDefinition } from './core/workflow-engine.js';
export type { WorkflowEngineOptions } from './core/workflow-engine.js';
export { nextTransitionState, initialTransitionState, isTerminal } from './core/transition-machine.js';
export type { TransitionState, TransitionEvent, TransitionConfig } from './core/transition-machine.js';
export { readStepOrdinal, stepIndicatorProbe } from './core/step-indicator.js';
export { loadUntilConverged, createPageContentSource, DEFAULT_LOADER_OPTIONS } from './core/content-loader.js';
export { discoverScrollTarget, byId, byAttribute, byClass, overflowHeuristic } from './core/scroll-target.js';
export type { ScrollTarget, ScrollTargetStrategy } from './core/scroll-target.js';
export { classifyProgress, classifyMilestone, findMarker } from './core/progress-classifier.js';
export { readTimeline, toMarkers } from './core/timeline-reader.js';
export type { TimelineSelectors, VisualStateRules } from './core/timeline-reader.js';
export { probeFirst, requireElement, selectorProbe, anyOfProbe } from './core/element-probes.js';
export type { ElementProbe, ProbeHit } from './core/element-probes.js';

// Browser integration
export { BrowserManager } from './core/browser-manager.js';
export { PlaywrightPageDriver } from './core/playwright-page-driver.js';
export { PortalAuthenticator } from './core/portal-authenticator.js';
export type { ChallengeSolver, PortalAuthenticatorOptions } from './core/portal-authenticator.js';

// Portal workflows
export { createAppointmentWorkflow, APPOINTMENT_WORKFLOWS } from './workflows/appointment.js';
export type { AppointmentMode } from './workflows/appointment.js';
export {
  findContainer,
  countContainers,
  containerMilestoneStatus,
  bookingNumberLookup,
  extractBookingNumber,
  containerRowSelector,
} from './workflows/containers.js';
export type { BookingNumberResult, ContainerPageSelectors } from './workflows/containers.js';
export { listAppointments } from './workflows/appointment-list.js';
export type { AppointmentListRequest, AppointmentListResult } from './workflows/appointment-list.js';

// Errors
export {
  EngineError,
  AuthenticationError,
  SessionExpiredError,
  SessionInvalidError,
  PhaseActionFailedError,
  RunNotFoundError,
  RunBusyError,
  RunClosedError,
  WorkflowDefinitionError,
  BrowserUnavailableError,
} from './core/errors.js';

// Configuration and logging
export { parseAppConfig } from './utils/env-parser.js';
export { ConfigValidationError } from './utils/config-schemas.js';
export type { AppConfig } from './utils/config-schemas.js';
export { configureLogger, logger } from './utils/logger.js';

export * from './types/index.js';
