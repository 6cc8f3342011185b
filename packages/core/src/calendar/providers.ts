/**
 * Provider Profiles
 *
 * Server-specific behaviour, selected once from the server URL when the
 * client is created.
 */

export type ProviderName = 'generic' | 'yandex'

export interface ProviderProfile {
  name: ProviderName
  /** Appended to transport error messages, or null */
  transportHint: string | null
}

const GENERIC: ProviderProfile = {
  name: 'generic',
  transportHint: null,
}

const YANDEX: ProviderProfile = {
  name: 'yandex',
  transportHint:
    'Yandex Calendar throttles CalDAV requests (roughly one write per minute); slow down and try again later',
}

const YANDEX_HOSTS = /(^|\.)yandex\.(ru|com)$/i

export function selectProvider(url: string): ProviderProfile {
  let host: string
  try {
    host = new URL(url).hostname
  } catch {
    return GENERIC
  }
  return YANDEX_HOSTS.test(host) ? YANDEX : GENERIC
}
