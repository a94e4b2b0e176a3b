// src/config/configuration.ts

export type AppConfig = {
  env: string;
  port: number;
  origins: string[];
  wsPath: string;
  mongo: { uri: string; dbName: string };
  auth: {
    introspectUrl: string;
    scheme: string;
    tlsInsecure: boolean;
    internalToken: string;
  };
  calls: {
    store: 'mongo' | 'memory';
    ringTimeoutMs: number;
    sipSimulatedDelayMs: number;
  };
  sms: { simulatedDelayMs: number };
  webrtc: { iceServers: string[] };
  users: { bcryptRounds: number; onlineWindowMs: number };
};

const DEFAULT_ICE_SERVERS = 'stun:stun.l.google.com:19302,stun:stun1.l.google.com:19302';

function list(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function int(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isFinite(n) && raw !== undefined && raw !== '' ? Math.trunc(n) : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    env: (env.NODE_ENV || 'development').toLowerCase(),
    port: int(env.PORT, 4000),
    origins: list(env.ORIGINS),
    wsPath: env.WS_PATH || '/ws',
    mongo: {
      uri: env.MONGODB_URI ?? '',
      dbName: env.MONGODB_DB || 'ucp',
    },
    auth: {
      introspectUrl: env.AUTH_INTROSPECT_URL ?? '',
      scheme: (env.AUTH_SCHEME ?? 'Bearer').trim(),
      tlsInsecure: (env.AUTH_TLS_INSECURE ?? '0') === '1',
      internalToken: env.INTERNAL_TOKEN ?? '',
    },
    calls: {
      store: env.CALL_STORE === 'memory' ? 'memory' : 'mongo',
      ringTimeoutMs: Math.max(0, int(env.CALL_RING_TIMEOUT_MS, 0)),
      sipSimulatedDelayMs: Math.max(0, int(env.SIP_SIMULATED_DELAY_MS, 2000)),
    },
    sms: {
      simulatedDelayMs: Math.max(0, int(env.SMS_SIMULATED_DELAY_MS, 1000)),
    },
    webrtc: {
      iceServers: list(env.WEBRTC_ICE_SERVERS ?? DEFAULT_ICE_SERVERS),
    },
    users: {
      bcryptRounds: int(env.BCRYPT_ROUNDS, 10),
      onlineWindowMs: int(env.ONLINE_WINDOW_MS, 5 * 60 * 1000),
    },
  };
}

export default () => loadConfig();
