import { MetricsService } from './metrics.service';

describe('MetricsService', () => {
  it('counts per label set regardless of label order', () => {
    const m = new MetricsService();
    m.inc('relay_deliveries_total', { event: 'webrtc_offer' }, 2);
    m.inc('relay_deliveries_total', { event: 'webrtc_offer' });
    m.inc('call_transitions_total', { to: 'ringing', from: 'initiated' });

    expect(m.counter('relay_deliveries_total', { event: 'webrtc_offer' })).toBe(3);
    expect(m.counter('call_transitions_total', { from: 'initiated', to: 'ringing' })).toBe(1);
    expect(m.counter('relay_deliveries_total', { event: 'webrtc_answer' })).toBe(0);
  });

  it('declares each counter family once', () => {
    const m = new MetricsService();
    m.inc('relay_dropped_total', { event: 'webrtc_offer' });
    m.inc('relay_dropped_total', { event: 'call_ended' });

    expect(m.renderPrometheusText()).toBe(
      [
        '# TYPE relay_dropped_total counter',
        'relay_dropped_total{event="webrtc_offer"} 1',
        'relay_dropped_total{event="call_ended"} 1',
        '',
      ].join('\n'),
    );
  });

  it('renders counters and timings as text', () => {
    const m = new MetricsService();
    m.inc('calls_created_total');
    m.observeMs('http_request', 12, { method: 'GET' });
    m.observeMs('http_request', 30, { method: 'GET' });

    expect(m.renderPrometheusText()).toBe(
      [
        '# TYPE calls_created_total counter',
        'calls_created_total 1',
        'http_request_count{method="GET"} 2',
        'http_request_sum_ms{method="GET"} 42',
        'http_request_max_ms{method="GET"} 30',
        '',
      ].join('\n'),
    );
  });
});
