// src/observability/metrics.service.ts

import { Injectable } from '@nestjs/common';

type CounterKey = string;
type Labels = Record<string, string>;

@Injectable()
export class MetricsService {
  private counters = new Map<CounterKey, number>();
  private timings = new Map<string, { count: number; sumMs: number; maxMs: number }>();

  inc(name: string, labels?: Labels, by = 1) {
    const key = this.key(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + by);
  }

  observeMs(name: string, ms: number, labels?: Labels) {
    const key = this.key(name, labels);
    const cur = this.timings.get(key) ?? { count: 0, sumMs: 0, maxMs: 0 };
    cur.count += 1;
    cur.sumMs += ms;
    cur.maxMs = Math.max(cur.maxMs, ms);
    this.timings.set(key, cur);
  }

  counter(name: string, labels?: Labels): number {
    return this.counters.get(this.key(name, labels)) ?? 0;
  }

  renderPrometheusText(): string {
    const lines: string[] = [];
    const typed = new Set<string>();

    // key format: name{a="b",...}
    for (const [key, val] of this.counters.entries()) {
      const { name } = this.split(key);
      if (!typed.has(name)) {
        typed.add(name);
        lines.push(`# TYPE ${name} counter`);
      }
      lines.push(`${key} ${val}`);
    }

    // timings stay untyped: three plain series per name

    for (const [key, t] of this.timings.entries()) {
      const { name, labels } = this.split(key);
      lines.push(`${name}_count${labels} ${t.count}`);
      lines.push(`${name}_sum_ms${labels} ${t.sumMs}`);
      lines.push(`${name}_max_ms${labels} ${t.maxMs}`);
    }

    return lines.join('\n') + '\n';
  }

  private split(key: string) {
    const i = key.indexOf('{');
    return i < 0 ? { name: key, labels: '' } : { name: key.slice(0, i), labels: key.slice(i) };
  }

  private key(name: string, labels?: Labels) {
    if (!labels || !Object.keys(labels).length) return name;
    const body = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}="${String(v).replace(/"/g, '\\"')}"`)
      .join(',');
    return `${name}{${body}}`;
  }
}
