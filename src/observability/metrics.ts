import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'timelock-escrow' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Escrow Ledger Metrics
// ============================================

/**
 * Ledger operations by name (store, claim, ...) and outcome (success or error code)
 */
export const escrowOperationsTotal = new Counter({
  name: 'escrow_operations_total',
  help: 'Escrow ledger operations by operation and outcome',
  labelNames: ['operation', 'outcome'] as const,
  registers: [registry],
});

export const escrowOperationDuration = new Histogram({
  name: 'escrow_operation_duration_seconds',
  help: 'Escrow ledger operation duration in seconds, including queue wait',
  labelNames: ['operation'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [registry],
});

/**
 * Approximate: base-unit amounts above 2^53 lose precision as gauge values
 */
export const escrowFeesCollected = new Gauge({
  name: 'escrow_fees_collected',
  help: 'Fees currently held in the fee pool, in base units',
  registers: [registry],
});

export const escrowRecordsTotal = new Gauge({
  name: 'escrow_records_total',
  help: 'Escrow records created since the ledger was initialized',
  registers: [registry],
});

// ============================================
// Wallet Metrics
// ============================================

export const walletOperationsTotal = new Counter({
  name: 'wallet_operations_total',
  help: 'Wallet operations by type',
  labelNames: ['operation'] as const, // debit, credit, refund, deposit
  registers: [registry],
});

// ============================================
// Authentication Metrics
// ============================================

export const authAttemptsTotal = new Counter({
  name: 'auth_attempts_total',
  help: 'Authentication attempts by outcome',
  labelNames: ['outcome'] as const, // success, failure
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

/**
 * Get all metrics as Prometheus text format
 */
export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
