import { logLevelsFor, parseExpiresIn, validateEnv } from '../env.validation';

describe('validateEnv', () => {
  it('fills in development defaults', () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: 'development',
      PORT: 5000,
      DATABASE_URL: undefined,
      JWT_SECRET_KEY: 'change-me',
      JWT_EXPIRES_IN: '1h',
      BCRYPT_ROUNDS: 10,
      LOG_LEVEL: 'verbose',
    });
  });

  it('parses numeric settings and keeps unrelated keys', () => {
    const env = validateEnv({ PORT: '8080', BCRYPT_ROUNDS: '12', LOG_LEVEL: 'warn', HOME: '/root' });

    expect(env.PORT).toBe(8080);
    expect(env.BCRYPT_ROUNDS).toBe(12);
    expect(env.LOG_LEVEL).toBe('warn');
    expect(env.HOME).toBe('/root');
  });

  it('reads a digits-only token lifetime as seconds', () => {
    expect(validateEnv({ JWT_EXPIRES_IN: '3600' }).JWT_EXPIRES_IN).toBe(3600);
    expect(validateEnv({ JWT_EXPIRES_IN: '15m' }).JWT_EXPIRES_IN).toBe('15m');
  });

  it('refuses to start in production without a signing secret', () => {
    expect(() => validateEnv({ NODE_ENV: 'production' })).toThrow(
      'Missing required environment variable: JWT_SECRET_KEY',
    );
    expect(() => validateEnv({ NODE_ENV: 'production', JWT_SECRET_KEY: 'change-me' })).toThrow(
      'Missing required environment variable: JWT_SECRET_KEY',
    );
  });

  it('rejects out-of-range numbers', () => {
    expect(() => validateEnv({ BCRYPT_ROUNDS: '3' })).toThrow(
      'Invalid BCRYPT_ROUNDS: expected an integer between 4 and 15, got "3"',
    );
    expect(() => validateEnv({ PORT: 'http' })).toThrow(/^Invalid PORT/);
  });

  it('rejects unknown database schemes and log levels', () => {
    expect(() => validateEnv({ DATABASE_URL: 'mysql://db/catalog' })).toThrow('Unsupported DATABASE_URL scheme: mysql');
    expect(() => validateEnv({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid LOG_LEVEL/);
  });
});

describe('parseExpiresIn', () => {
  it('keeps timespans, converts bare seconds and defaults to one hour', () => {
    expect(parseExpiresIn('7d')).toBe('7d');
    expect(parseExpiresIn(' 900 ')).toBe(900);
    expect(parseExpiresIn(120)).toBe(120);
    expect(parseExpiresIn(undefined)).toBe('1h');
    expect(parseExpiresIn('')).toBe('1h');
  });
});

describe('logLevelsFor', () => {
  it('enables every level up to the threshold', () => {
    expect(logLevelsFor('error')).toEqual(['error']);
    expect(logLevelsFor('warn')).toEqual(['error', 'warn']);
    expect(logLevelsFor('verbose')).toEqual(['error', 'warn', 'log', 'debug', 'verbose']);
  });
});
