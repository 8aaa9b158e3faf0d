import { ValidationError, runWithBoundary } from '../errors.js';
import type { EndpointCache } from '../cache/cache.js';
import type { LivenessReport } from '../types/index.js';

export interface Pinger {
  ping(endpointUrl: string): Promise<LivenessReport>;
}

export interface StatusReporterOptions {
  manifestUrl: string;
  cache: EndpointCache;
  pinger: Pinger;
  output?: (line: string) => void;
  writeError?: (line: string) => void;
}

const INDENT = '      ';

export class StatusReporter {
  private readonly manifestUrl: string;
  private readonly cache: EndpointCache;
  private readonly pinger: Pinger;
  private readonly output: (line: string) => void;
  private readonly writeError: ((line: string) => void) | undefined;

  constructor(options: StatusReporterOptions) {
    this.manifestUrl = options.manifestUrl;
    this.cache = options.cache;
    this.pinger = options.pinger;
    this.output = options.output ?? ((line) => console.log(line));
    this.writeError = options.writeError;
  }

  /** Runs the report and returns the process exit status. */
  async run(requested: readonly string[]): Promise<number> {
    return runWithBoundary(() => this.report(requested), this.writeError);
  }

  /**
   * Pings the requested services in order, or every known service (sorted by
   * name) when none are given. Unknown names fail before any ping is sent, and
   * the first ping failure stops the report.
   */
  async report(requested: readonly string[]): Promise<void> {
    const endpoints = await this.cache.getOrRefresh(this.manifestUrl);
    const known = Object.keys(endpoints).sort();
    const services = requested.length > 0 ? [...requested] : known;

    const unknown = services.filter((service) => !Object.hasOwn(endpoints, service));
    if (unknown.length > 0) {
      throw new ValidationError(
        `Unknown service(s): ${unknown.join(', ')}. Known services: ${known.join(', ') || '(none)'}`,
      );
    }

    for (const service of services) {
      const report = await this.pinger.ping(endpoints[service]);
      // alive: false prints nothing, matching the historical output
      if (report.alive) {
        this.output(`${INDENT}${service}`);
        this.output(`${INDENT}Alive`);
      }
    }
  }
}
