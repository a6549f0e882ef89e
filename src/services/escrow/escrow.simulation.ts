/**
 * Transfer failure simulation
 *
 * Makes custody sends fail so the rollback path can be exercised end to end.
 * Only takes effect in test and development environments.
 */

import { config } from '../../config';
import { createServiceLogger } from '../../observability/logger';

const log = createServiceLogger('transfer-simulation');

export type FailureType = 'ERROR' | 'TIMEOUT';

export interface TransferSimulationConfig {
  enabled: boolean;
  /** 0-1, share of sends that fail */
  failureRate: number;
  failRecipients: Set<string>;
  failureType: FailureType;
  /** How long a TIMEOUT failure stalls before failing */
  timeoutMs: number;
}

export interface TransferSimulationView {
  enabled: boolean;
  failureRate: number;
  failRecipients: string[];
  failureType: FailureType;
  timeoutMs: number;
}

export class SimulatedFailureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulatedFailureError';
  }
}

const defaults = (): TransferSimulationConfig => ({
  enabled: false,
  failureRate: 0,
  failRecipients: new Set(),
  failureType: 'ERROR',
  timeoutMs: 30000,
});

export class TransferSimulation {
  private config: TransferSimulationConfig = defaults();

  constructor(private readonly random: () => number = Math.random) {}

  private isSimulationAllowed(): boolean {
    return config.isTest || config.isDevelopment;
  }

  /**
   * Omitted options keep their current values
   */
  enable(
    options: Partial<Omit<TransferSimulationConfig, 'enabled' | 'failRecipients'>> & {
      failRecipients?: string[];
    } = {}
  ): void {
    if (!this.isSimulationAllowed()) {
      log.warn('Transfer simulation is not allowed in this environment');
      return;
    }

    this.config = {
      enabled: true,
      failureRate: options.failureRate ?? this.config.failureRate,
      failRecipients: options.failRecipients
        ? new Set(options.failRecipients)
        : this.config.failRecipients,
      failureType: options.failureType ?? this.config.failureType,
      timeoutMs: options.timeoutMs ?? this.config.timeoutMs,
    };

    log.info(this.getConfig(), 'Transfer simulation enabled');
  }

  /**
   * Disabling also clears the recipient list
   */
  disable(): void {
    this.config.enabled = false;
    this.config.failRecipients.clear();
    log.info('Transfer simulation disabled');
  }

  addFailingRecipients(recipients: string[]): void {
    if (!this.isSimulationAllowed()) return;

    recipients.forEach((recipient) => this.config.failRecipients.add(recipient));
    log.info({ recipients }, 'Added failing recipients');
  }

  removeFailingRecipients(recipients: string[]): void {
    recipients.forEach((recipient) => this.config.failRecipients.delete(recipient));
  }

  getConfig(): TransferSimulationView {
    return {
      ...this.config,
      failRecipients: Array.from(this.config.failRecipients),
    };
  }

  shouldFail(recipient: string): boolean {
    if (!this.config.enabled) {
      return false;
    }

    if (this.config.failRecipients.has(recipient)) {
      log.info({ recipient }, 'Recipient marked for transfer failure');
      return true;
    }

    if (this.config.failureRate > 0 && this.random() < this.config.failureRate) {
      log.info({ recipient, failureRate: this.config.failureRate }, 'Transfer failed by rate');
      return true;
    }

    return false;
  }

  /**
   * Throws SimulatedFailureError when the send to `recipient` should fail
   */
  async simulateFailure(recipient: string): Promise<void> {
    if (!this.shouldFail(recipient)) {
      return;
    }

    if (this.config.failureType === 'TIMEOUT') {
      await new Promise((resolve) => setTimeout(resolve, this.config.timeoutMs));
    }

    throw new SimulatedFailureError(`Simulated transfer failure for recipient ${recipient}`);
  }

  reset(): void {
    this.config = defaults();
    log.info('Transfer simulation reset to defaults');
  }
}

export const transferSimulation = new TransferSimulation();
