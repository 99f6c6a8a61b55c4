import { Player, DEFAULT_INITIAL_STAKE } from './player';
import { ConservativeStrategy } from '../strategies/conservative-strategy';

describe('Player', () => {
  beforeEach(() => {
    Player.resetCounter();
  });

  it('assigns sequential default ids', () => {
    const strategy = new ConservativeStrategy();
    expect(new Player(strategy).id).toBe('Player1');
    expect(new Player(strategy).id).toBe('Player2');
  });

  it('keeps an explicit id and shares the strategy instance', () => {
    const strategy = new ConservativeStrategy();
    const player = new Player(strategy, { id: 'alice' });
    expect(player.id).toBe('alice');
    expect(player.strategy).toBe(strategy);
    expect(player.stake).toBe(DEFAULT_INITIAL_STAKE);
  });

  it('tracks total score and stake until reset', () => {
    const player = new Player(new ConservativeStrategy(), { initialStake: 50 });
    player.addScore(5);
    player.addScore(12);
    player.adjustStake(-2);
    expect(player.totalScore).toBe(17);
    expect(player.stake).toBe(48);
    expect(player.relativeStake).toBe(-2);

    player.resetStanding();
    expect(player.totalScore).toBe(0);
    expect(player.stake).toBe(50);
  });

  it('describes itself', () => {
    const player = new Player(new ConservativeStrategy(), { id: 'bob', initialStake: 10 });
    expect(player.toString()).toBe(
      'Player(id=bob, strategy=AlwaysConservative, total=0, stake=10)'
    );
  });
});
