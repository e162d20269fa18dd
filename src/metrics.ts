import type { Counter, Metrics } from './@types/metrics';

export interface MetricsRegistry {
  handshakeSuccesses: Counter
  handshakeErrors: Counter
  encryptedPackets: Counter
  decryptedPackets: Counter
  decryptErrors: Counter
}

export function registerMetrics (metrics: Metrics): MetricsRegistry {
  return {
    handshakeSuccesses: metrics.registerCounter('noise_channel_handshake_successes_total', {
      help: 'Total count of noise handshakes successes'
    }),

    handshakeErrors: metrics.registerCounter('noise_channel_handshake_errors_total', {
      help: 'Total count of noise handshakes errors'
    }),

    encryptedPackets: metrics.registerCounter('noise_channel_encrypted_packets_total', {
      help: 'Total count of noise encrypted packets successfully'
    }),

    decryptedPackets: metrics.registerCounter('noise_channel_decrypted_packets_total', {
      help: 'Total count of noise decrypted packets'
    }),

    decryptErrors: metrics.registerCounter('noise_channel_decrypt_errors_total', {
      help: 'Total count of noise decrypt errors'
    })
  };
}
