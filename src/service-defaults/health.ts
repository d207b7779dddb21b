/**
 * Health checks behind the `/health` endpoint
 */

export interface HealthCheckResult {
  healthy: boolean;
  message?: string;
}

export type HealthCheck = () => Promise<HealthCheckResult>;

export interface HealthCheckEntry extends HealthCheckResult {
  durationMs: number;
}

export interface HealthReport {
  status: 'Healthy' | 'Unhealthy';
  checks: Record<string, HealthCheckEntry>;
  timestamp: Date;
}

export class HealthCheckRegistry {
  private checks: Map<string, HealthCheck> = new Map();

  constructor() {
    this.register('self', async () => ({ healthy: true }));
  }

  register(name: string, check: HealthCheck): this {
    this.checks.set(name, check);
    return this;
  }

  names(): string[] {
    return [...this.checks.keys()];
  }

  /**
   * Run every check; a check that throws counts as unhealthy
   */
  async run(): Promise<HealthReport> {
    const checks: Record<string, HealthCheckEntry> = {};

    await Promise.all([...this.checks.entries()].map(async ([name, check]) => {
      const started = Date.now();
      try {
        const result = await check();
        checks[name] = { ...result, durationMs: Date.now() - started };
      } catch (error) {
        checks[name] = {
          healthy: false,
          message: error instanceof Error ? error.message : 'Unknown error',
          durationMs: Date.now() - started
        };
      }
    }));

    const healthy = Object.values(checks).every(c => c.healthy);

    return {
      status: healthy ? 'Healthy' : 'Unhealthy',
      checks,
      timestamp: new Date()
    };
  }
}
