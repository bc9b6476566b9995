import { ConfigService } from '@nestjs/config';
import { readBoolean, readNumber, readString } from './config.util';

describe('config.util', () => {
  const config = new ConfigService({
    TIMEOUT: '2500',
    BROKEN: 'ten',
    EMPTY: '',
    OFF: 'Off',
    ON: 'true',
    URL: 'https://stats.example.test/',
  });

  it('reads numbers with a fallback', () => {
    expect(readNumber(config, 'TIMEOUT', 10)).toBe(2500);
    expect(readNumber(config, 'BROKEN', 10)).toBe(10);
    expect(readNumber(config, 'EMPTY', 10)).toBe(10);
    expect(readNumber(config, 'MISSING', 10)).toBe(10);
  });

  it('reads booleans with a fallback', () => {
    expect(readBoolean(config, 'OFF', true)).toBe(false);
    expect(readBoolean(config, 'ON', false)).toBe(true);
    expect(readBoolean(config, 'MISSING', true)).toBe(true);
  });

  it('reads strings with a fallback', () => {
    expect(readString(config, 'URL', 'x')).toBe('https://stats.example.test/');
    expect(readString(config, 'EMPTY', 'x')).toBe('x');
  });
});
