import { cardLabel, makeCard } from '../../cards/Card.js';
import { seededRNG } from '../../util/rng.js';
import { Shoe, buildShoe, shuffle, shuffledSource } from '../shoe.js';

describe('shoe', () => {
  test('one deck holds every rank and suit once', () => {
    const shoe = buildShoe(1);
    expect(shoe).toHaveLength(52);
    expect(new Set(shoe.map(cardLabel)).size).toBe(52);
  });

  test('three decks hold three of each card', () => {
    const shoe = buildShoe(3);
    expect(shoe).toHaveLength(156);
    expect(shoe.filter((c) => c.rank === 'K' && c.suit === 'S')).toHaveLength(3);
  });

  test('shuffle is a permutation and leaves its input alone', () => {
    const cards = buildShoe(1);
    const before = cards.map(cardLabel);
    const shuffled = shuffle(cards, seededRNG(42));
    expect(cards.map(cardLabel)).toEqual(before);
    expect(shuffled.map(cardLabel).sort()).toEqual(before.slice().sort());
    expect(shuffled.map(cardLabel)).not.toEqual(before);
  });

  test('shuffle deterministic with seed', () => {
    const cards = buildShoe(1);
    expect(shuffle(cards, seededRNG(1)).map(cardLabel)).toEqual(shuffle(cards, seededRNG(1)).map(cardLabel));
  });

  test('drawing removes cards from the shoe', () => {
    const shoe = new Shoe(3, shuffledSource(seededRNG(7)));
    expect(shoe.remaining).toBe(156);
    for (let i = 0; i < 5; i++) shoe.draw();
    expect(shoe.remaining).toBe(151);
  });

  test('draws from the top, last card of the source first', () => {
    const top = makeCard('9', 'C');
    const shoe = new Shoe(1, () => [makeCard('2', 'H'), top]);
    expect(shoe.draw()).toBe(top);
  });

  test('an empty shoe rebuilds itself before drawing', () => {
    const onRebuild = jest.fn();
    const source = jest.fn(() => [makeCard('2', 'H'), makeCard('3', 'H')]);
    const shoe = new Shoe(2, source, onRebuild);
    shoe.draw();
    shoe.draw();
    expect(onRebuild).not.toHaveBeenCalled();
    expect(shoe.draw().rank).toBe('3');
    expect(onRebuild).toHaveBeenCalledWith(2);
    expect(source).toHaveBeenCalledTimes(2);
    expect(shoe.remaining).toBe(1);
  });

  test('deck count below one is raised to one', () => {
    expect(new Shoe(0).remaining).toBe(52);
  });

  test('a source that yields nothing is an error', () => {
    const shoe = new Shoe(1, () => []);
    expect(() => shoe.draw()).toThrow('Shoe source returned no cards');
  });
});
