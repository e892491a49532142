import { describe, it, expect, vi } from 'vitest';
import { runTournament } from '../../games/pikomino/Tournament';
import type { TournamentPlayer } from '../../games/pikomino/Tournament';

const PLAYERS: TournamentPlayer[] = [
  { name: 'Careful', strategy: { kind: 'conservative' } },
  { name: 'Bold', strategy: { kind: 'aggressive' } },
  { name: 'Sharp', strategy: { kind: 'optimal' } },
];

describe('runTournament', () => {
  it('should count one win per game', () => {
    const result = runTournament({ players: PLAYERS, games: 6, seed: 42 });

    expect(result.games).toBe(6);
    expect(result.players.map((p) => p.name)).toEqual(['Careful', 'Bold', 'Sharp']);
    expect(result.players.map((p) => p.strategyName)).toEqual([
      'conservative',
      'aggressive',
      'optimal',
    ]);
    expect(result.players.reduce((n, p) => n + p.wins, 0)).toBe(6);
    for (const p of result.players) {
      expect(p.winRate).toBe(p.wins / 6);
      expect(p.turnSuccessRate).toBeGreaterThanOrEqual(0);
      expect(p.turnSuccessRate).toBeLessThanOrEqual(1);
    }
  });

  it('should average turns over all games', () => {
    const result = runTournament({ players: PLAYERS, games: 4, seed: 7 });
    const turns = result.players.reduce(
      (n, p) => n + p.successfulTurns + p.failedTurns,
      0,
    );
    expect(result.averageTurnsPerGame).toBe(turns / 4);
  });

  it('should be reproducible from its seed', () => {
    const a = runTournament({ players: PLAYERS, games: 3, seed: 9 });
    const b = runTournament({ players: PLAYERS, games: 3, seed: 9 });
    expect(b).toEqual(a);
  });

  it('should report each game as it ends', () => {
    const onGameEnd = vi.fn();
    runTournament({ players: PLAYERS, games: 3, seed: 1, onGameEnd });

    expect(onGameEnd).toHaveBeenCalledTimes(3);
    expect(onGameEnd.mock.calls.map((call) => call[0])).toEqual([0, 1, 2]);
    for (const call of onGameEnd.mock.calls) {
      expect(['Careful', 'Bold', 'Sharp']).toContain(call[1]);
    }
  });

  it('should reject an empty tournament', () => {
    expect(() => runTournament({ players: PLAYERS, games: 0 })).toThrow(
      'A tournament needs at least one game, got 0',
    );
    expect(() => runTournament({ players: [], games: 1 })).toThrow(
      'A tournament needs at least one player',
    );
  });
});
