import { describe, it, expect } from 'vitest';
import { displayLobbyName, mapFromSettings, modsFromSettings, parseAuthKind } from './lobby-fields';

describe('lobby fields', () => {
  it('strips the chat lobby prefix', () => {
    expect(displayLobbyName('~chat~pub~~Friday Night')).toBe('Friday Night');
    expect(displayLobbyName('Plain Name')).toBe('Plain Name');
  });

  it('reads the map from the settings string', () => {
    expect(mapFromSettings('1*bzone01*x*0')).toBe('bzone01');
    expect(mapFromSettings('1*unknown')).toBeNull();
    expect(mapFromSettings('*')).toBeNull();
    expect(mapFromSettings(undefined)).toBeNull();
  });

  it('reads the workshop mod, ignoring stock', () => {
    expect(modsFromSettings('1*map*x*1325933293')).toEqual(['1325933293']);
    expect(modsFromSettings('1*map*x*0')).toEqual([]);
    expect(modsFromSettings('1*map')).toEqual([]);
  });

  it('prefers the explicit auth type over the id prefix', () => {
    expect(parseAuthKind('GOG', 'S1')).toBe('gog');
    expect(parseAuthKind(undefined, 'S76561198000000000')).toBe('steam');
    expect(parseAuthKind(undefined, 'G49')).toBe('gog');
    expect(parseAuthKind('web', '42')).toBe('unknown');
  });
});
