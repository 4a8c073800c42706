import { migrate, openDb } from '../connection.js';
import { getKV, setKV } from '../kv.js';

describe('kv', () => {
  test('missing key is null', () => {
    const db = openDb(':memory:');
    expect(getKV(db, 'nope')).toBeNull();
    db.close();
  });

  test('set then overwrite', () => {
    const db = openDb(':memory:');
    setKV(db, 'k', 'one');
    expect(getKV(db, 'k')).toBe('one');
    setKV(db, 'k', 'two');
    expect(getKV(db, 'k')).toBe('two');
    db.close();
  });

  test('migration is repeatable', () => {
    const db = openDb(':memory:');
    setKV(db, 'k', 'v');
    migrate(db);
    expect(getKV(db, 'k')).toBe('v');
    db.close();
  });
});
