// src/realtime/realtime.types.ts

export const EVT = {
  // relay inbound
  SIGNAL: 'signal',
  ICE_SERVERS: 'ice_servers',

  // calls
  WEBRTC_OFFER: 'webrtc_offer',
  WEBRTC_ANSWER: 'webrtc_answer',
  WEBRTC_ICE_CANDIDATE: 'webrtc_ice_candidate',
  INCOMING_CALL: 'incoming_call',
  CALL_ANSWERED: 'call_answered',
  CALL_ENDED: 'call_ended',

  // presence
  USER_STATUS_UPDATE: 'user_status_update',
  USER_CONNECTED: 'user_connected',
  USER_DISCONNECTED: 'user_disconnected',

  // chat
  NEW_MESSAGE: 'new_message',
} as const;

export type OutboundEvent = (typeof EVT)[Exclude<keyof typeof EVT, 'SIGNAL' | 'ICE_SERVERS'>];

export const SIGNAL_TYPES = ['offer', 'answer', 'ice_candidate', 'answer_call', 'end_call'] as const;
export type SignalType = (typeof SIGNAL_TYPES)[number];

/** Opaque SDP or ICE blob; the relay never looks inside. */
export type SignalPayload = Record<string, unknown>;

export type PartyRef = { id: string; name: string; username?: string };

export type IceServer = { urls: string };

export function toIceServers(urls: string[]): IceServer[] {
  return urls.map((u) => ({ urls: u }));
}
