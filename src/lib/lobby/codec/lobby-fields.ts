/**
 * Field conventions shared by both lobby protocols
 */

import { WEBSOCKET_CONSTANTS } from '../constants';
import type { AuthKind } from '../types';

/**
 * Strip the `~chat~pub~~`-style prefix off a lobby name
 */
export function displayLobbyName(rawName: string): string {
  const separator = WEBSOCKET_CONSTANTS.NAME_SEPARATOR;
  const at = rawName.lastIndexOf(separator);
  return at === -1 ? rawName : rawName.slice(at + separator.length);
}

/**
 * Map name is field 1 of the `*`-separated ready/settings string
 */
export function mapFromSettings(settings: string | undefined): string | null {
  if (!settings) {
    return null;
  }
  const parts = settings.split('*');
  const map = parts.length >= 2 ? parts[1] : '';
  return map && map !== 'unknown' ? map : null;
}

/**
 * Workshop mod id is field 3 of the game settings string; `0` means stock
 */
export function modsFromSettings(settings: string | undefined): string[] {
  if (!settings) {
    return [];
  }
  const mod = settings.split('*')[3];
  return mod && mod !== '0' ? [mod] : [];
}

/**
 * Explicit auth type wins; otherwise platform ids carry an `S` (Steam) or `G` (GOG) prefix
 */
export function parseAuthKind(authType: string | undefined, playerId: string): AuthKind {
  const normalized = authType?.toLowerCase();
  if (normalized === 'steam') {
    return 'steam';
  }
  if (normalized === 'gog') {
    return 'gog';
  }
  if (playerId.startsWith('S')) {
    return 'steam';
  }
  if (playerId.startsWith('G')) {
    return 'gog';
  }
  return 'unknown';
}
