// ============================================================
// 在线人数解析
// 按顺序尝试各响应格式的匹配器，首个命中者生效；全部未命中返回 0
// ============================================================

type CountMatcher = (response: string) => number | null;

const STANDARD_PATTERN = /^(\d+)\/\d+$/;
const NUMBERED_LIST_PATTERN = /^(\d+)\.\s*([^,]+),\s*(.+)$/gm;
const CSV_HEADER = 'name,playeruid,steamid';
const CSV_ROW_PATTERN = /^(?!name,).+$/gm;
const ONLINE_PLAYERS_PATTERN = /Online players \((\d+)\):/;
const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;
const INT32_MAX = 2_147_483_647;
const INT32_MIN = -2_147_483_648;

function toInt32(raw: string): number | null {
  if (!INTEGER_PATTERN.test(raw)) return null;
  const value = Number.parseInt(raw.trim(), 10);
  if (!Number.isSafeInteger(value) || value > INT32_MAX || value < INT32_MIN) return null;
  return value;
}

/** "5/20" */
export const matchStandardCount: CountMatcher = (response) => {
  const match = STANDARD_PATTERN.exec(response.trim());
  return match ? toInt32(match[1]) : null;
};

/** 编号列表（如 Ark 的 ListPlayers）："0. Alice, 7656..." 每行一名玩家 */
export const matchNumberedList: CountMatcher = (response) => {
  const count = response.replace(/\r/g, '').match(NUMBERED_LIST_PATTERN)?.length ?? 0;
  return count > 0 ? count : null;
};

/** 带表头的 CSV（如 Palworld 的 ShowPlayers） */
export const matchCsvListing: CountMatcher = (response) => {
  if (!response.includes(CSV_HEADER)) return null;
  const count = response.replace(/\r/g, '').match(CSV_ROW_PATTERN)?.length ?? 0;
  return count > 0 ? count : null;
};

/** "Online players (3):"（如 Factorio 的 /players online） */
export const matchOnlinePlayersHeader: CountMatcher = (response) => {
  const match = ONLINE_PLAYERS_PATTERN.exec(response);
  return match ? toInt32(match[1]) : null;
};

export function createCustomPatternMatcher(pattern: string): CountMatcher {
  return (response) => {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern);
    } catch {
      console.warn(`[PlayerCount] 自定义正则无效，已忽略: ${pattern}`);
      return null;
    }
    const match = regex.exec(response);
    return match ? toInt32(match[0]) : null;
  };
}

const BUILTIN_MATCHERS: CountMatcher[] = [
  matchStandardCount,
  matchNumberedList,
  matchCsvListing,
  matchOnlinePlayersHeader,
];

/**
 * 从任意服务端响应文本中提取在线人数，从不抛出。
 * 返回 0 既可能是空服也可能是无法解析，调用方需结合原始响应判断。
 */
export function extractPlayerCount(response: string | null | undefined, customPattern?: string | null): number {
  if (!response || !response.trim()) {
    return 0;
  }
  if (!/\d/.test(response)) {
    return 0;
  }

  const matchers = customPattern ? [...BUILTIN_MATCHERS, createCustomPatternMatcher(customPattern)] : BUILTIN_MATCHERS;
  for (const matcher of matchers) {
    const count = matcher(response);
    if (count !== null) return count;
  }
  return 0;
}

/** 展示用："<response>/<max>"，上限未知时写 Unknown */
export function formatPlayerCount(response: string | null | undefined, maxPlayers = 0): string {
  if (!response) {
    return maxPlayers > 0 ? `N/A/${maxPlayers}` : 'N/A';
  }
  const maxDisplay = maxPlayers > 0 ? String(maxPlayers) : 'Unknown';
  return `${response}/${maxDisplay}`;
}
