/**
 * Lotto 6/45 game shape and statistics-source defaults.
 * Every stats value can be overridden from the environment (see .env.example).
 */

export const LOTTO_CONFIG = {
  numbers: {
    min: 1,
    max: 45,
  },

  // 5 games of 6 main numbers + 1 bonus
  draw: {
    numSets: 5,
    pickSize: 7,
    smoothing: 100, // count spread 145-190 becomes weight spread 245-290
  },

  stats: {
    url: 'https://dhlottery.co.kr/gameResult.do?method=statByNumber',
    referer: 'https://dhlottery.co.kr/',
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    acceptLanguage: 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7',
    encoding: 'euc-kr', // the source does not serve UTF-8
    timeoutMs: 10000,
    cacheTtlMs: 3600000, // 1 hour
    tlsRejectUnauthorized: true,
    scheduledRefresh: true,
  },

  // Source layout: [number, graph, win count]
  table: {
    marker: '당첨횟수',
    minColumns: 3,
    numberColumn: 0,
    countColumn: 2,
  },
} as const;

export const DATASET_SIZE = LOTTO_CONFIG.numbers.max - LOTTO_CONFIG.numbers.min + 1;
