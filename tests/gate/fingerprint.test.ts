import { contentHash, eventIdKey, fingerprint } from '../../src/gate/fingerprint.js';
import { createActionClassifier, DEFAULT_NAVIGATIONAL_ACTIONS, DEFAULT_NAVIGATIONAL_PREFIXES } from '../../src/gate/classifier.js';

describe('fingerprint', () => {
  it('uses the first 12 hex characters of the md5 digest', () => {
    expect(contentHash('hello')).toBe('5d41402abc4b');
  });

  it('namespaces content keys by chat', () => {
    expect(fingerprint('42', 'hello')).toBe('content:42:5d41402abc4b');
    expect(fingerprint('43', 'hello')).not.toBe(fingerprint('42', 'hello'));
  });

  it('is stable for identical payloads and differs for different ones', () => {
    expect(fingerprint('1', 'vote_yes')).toBe(fingerprint('1', 'vote_yes'));
    expect(fingerprint('1', 'vote_yes')).not.toBe(fingerprint('1', 'vote_no'));
  });

  it('builds event id keys', () => {
    expect(eventIdKey('42', 'm1')).toBe('id:42:m1');
  });
});

describe('createActionClassifier', () => {
  const isNavigational = createActionClassifier({
    prefixes: DEFAULT_NAVIGATIONAL_PREFIXES,
    actions: DEFAULT_NAVIGATIONAL_ACTIONS,
  });

  it('matches configured prefixes', () => {
    expect(isNavigational('menu_main')).toBe(true);
    expect(isNavigational('back_to_list')).toBe(true);
    expect(isNavigational('page_3')).toBe(true);
  });

  it('matches literal actions exactly', () => {
    expect(isNavigational('/start')).toBe(true);
    expect(isNavigational('help')).toBe(true);
    expect(isNavigational('helpme')).toBe(false);
  });

  it('is case-sensitive and ignores surrounding whitespace', () => {
    expect(isNavigational('MENU_main')).toBe(false);
    expect(isNavigational('  /status  ')).toBe(true);
  });

  it('treats empty payloads as stateful', () => {
    expect(isNavigational('')).toBe(false);
    expect(isNavigational('   ')).toBe(false);
  });

  it('treats anything else as stateful', () => {
    expect(isNavigational('vote_yes')).toBe(false);
    expect(isNavigational('buy_item_7')).toBe(false);
  });

  it('ignores blank rules', () => {
    const classifier = createActionClassifier({ prefixes: [' ', ''], actions: ['', 'ping'] });
    expect(classifier('anything')).toBe(false);
    expect(classifier('ping')).toBe(true);
  });
});
