export interface Counter {
  readonly name: string;
  inc(amount?: number): void;
  value(): number;
}

export interface Gauge {
  readonly name: string;
  set(value: number): void;
  value(): number;
}

export interface Histogram {
  readonly name: string;
  observe(value: number): void;
  percentile(percentile: number): number | null;
  count(): number;
  reset(): void;
}

class InMemoryCounter implements Counter {
  #value = 0;
  constructor(public readonly name: string) {}

  inc(amount = 1): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new Error(`Invalid counter increment for ${this.name}: ${amount}`);
    }
    this.#value += amount;
  }

  value(): number {
    return this.#value;
  }

  reset(): void {
    this.#value = 0;
  }
}

class InMemoryGauge implements Gauge {
  #value = 0;
  constructor(public readonly name: string) {}

  set(value: number): void {
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid gauge value for ${this.name}: ${value}`);
    }
    this.#value = value;
  }

  value(): number {
    return this.#value;
  }
}

class InMemoryHistogram implements Histogram {
  #values: number[] = [];
  constructor(public readonly name: string) {}

  observe(value: number): void {
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid histogram value for ${this.name}: ${value}`);
    }
    this.#values.push(value);
  }

  percentile(percentile: number): number | null {
    if (this.#values.length === 0) {
      return null;
    }

    const sorted = [...this.#values].sort((a, b) => a - b);
    const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil((percentile / 100) * sorted.length) - 1));
    return sorted[index];
  }

  count(): number {
    return this.#values.length;
  }

  reset(): void {
    this.#values = [];
  }
}

const counters = new Map<string, InMemoryCounter>();
const gauges = new Map<string, InMemoryGauge>();
const histograms = new Map<string, InMemoryHistogram>();

function getOrCreate<T>(registry: Map<string, T>, name: string, factory: () => T): T {
  const existing = registry.get(name);
  if (existing) {
    return existing;
  }

  const created = factory();
  registry.set(name, created);
  return created;
}

export function counter(name: string): Counter {
  return getOrCreate(counters, name, () => new InMemoryCounter(name));
}

export function gauge(name: string): Gauge {
  return getOrCreate(gauges, name, () => new InMemoryGauge(name));
}

export function histogram(name: string): Histogram {
  return getOrCreate(histograms, name, () => new InMemoryHistogram(name));
}

export function resetMetrics(): void {
  for (const metric of counters.values()) {
    metric.reset();
  }
  for (const metric of gauges.values()) {
    metric.set(0);
  }
  for (const metric of histograms.values()) {
    metric.reset();
  }
}
