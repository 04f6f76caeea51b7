/**
 * @module detectors/patterns
 * @description Regex recognizers with context words for structured personal data
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-18
 */

// ============================================================================
// Pattern Types
// ============================================================================

/**
 * A recognizer pattern with its base score and context words
 */
export interface RecognizerPattern {
  /** Unique identifier for the pattern */
  id: string;
  /** Label reported as the detection's rawType (pattern/shared vocabulary) */
  rawType: string;
  /** Regex pattern (global flag will be added) */
  pattern: RegExp;
  /** Score of a bare match */
  score: number;
  /** Lowercase words that raise the score when found just before a match */
  contextWords: readonly string[];
  /** Description of what this pattern matches */
  description: string;
  /** Example matches */
  examples: string[];
  /**
   * Fast check function - returns false if text definitely doesn't contain a match.
   * If undefined, regex is always run.
   */
  fastCheck?: (text: string) => boolean;
  /** Final say on a regex match (range checks the regex cannot express) */
  accept?: (match: string) => boolean;
}

// ============================================================================
// Context Words
// ============================================================================

const PHONE_CONTEXT = ['tel', '電話', '携帯', '自宅', 'phone', 'call'];
const ZIP_CONTEXT = ['〒', '郵便番号', '郵便', 'zip', 'postal'];
const BIRTH_CONTEXT = ['生年月日', '年齢', '生まれ', '誕生日', '生年', '年月日', 'birth', 'dob'];

// ============================================================================
// Contact Patterns
// ============================================================================

export const EMAIL_PATTERN: RecognizerPattern = {
  id: 'email',
  rawType: 'EMAIL_ADDRESS',
  pattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g,
  score: 0.95,
  contextWords: ['mail', 'メール'],
  description: 'Matches email addresses',
  examples: ['taro@example.jp', 'first.last+tag@mail.example.com'],
  fastCheck: (text) => text.includes('@'),
};

/**
 * Japanese landline or mobile number with hyphens
 */
export const JP_PHONE_PATTERN: RecognizerPattern = {
  id: 'jp-phone',
  rawType: 'PHONE_NUMBER_JP',
  pattern: /(?<!\d)0\d{1,4}-\d{1,4}-\d{4}(?!\d)/g,
  score: 0.7,
  contextWords: PHONE_CONTEXT,
  description: 'Matches hyphenated Japanese phone numbers',
  examples: ['03-1234-5678', '0466-12-3456'],
};

export const JP_MOBILE_PATTERN: RecognizerPattern = {
  id: 'jp-mobile',
  rawType: 'PHONE_NUMBER_JP',
  pattern: /(?<!\d)0[789]0-\d{4}-\d{4}(?!\d)/g,
  score: 0.8,
  contextWords: PHONE_CONTEXT,
  description: 'Matches Japanese mobile numbers (070/080/090)',
  examples: ['090-1234-5678'],
};

export const JP_INTERNATIONAL_PHONE_PATTERN: RecognizerPattern = {
  id: 'jp-phone-international',
  rawType: 'PHONE_NUMBER_JP',
  pattern: /\+81-?\d{1,4}-?\d{1,4}-?\d{4}(?!\d)/g,
  score: 0.7,
  contextWords: PHONE_CONTEXT,
  description: 'Matches Japanese numbers in +81 form',
  examples: ['+81-90-1234-5678', '+81312345678'],
  fastCheck: (text) => text.includes('+81'),
};

export const US_PHONE_PATTERN: RecognizerPattern = {
  id: 'us-phone',
  rawType: 'PHONE_NUMBER',
  pattern: /(?:\+1-?\d{3}-?\d{3}-?\d{4}|\(\d{3}\)\s?\d{3}-\d{4})(?!\d)/g,
  score: 0.7,
  contextWords: PHONE_CONTEXT,
  description: 'Matches US numbers in +1 or (123) 456-7890 form',
  examples: ['+1-212-555-0100', '(212) 555-0100'],
};

// ============================================================================
// Postal Code Patterns
// ============================================================================

/**
 * Japanese postal code. Digit runs and hyphen chains on either side are
 * excluded so phone numbers and year ranges do not match.
 */
export const JP_ZIP_PATTERN: RecognizerPattern = {
  id: 'jp-zip',
  rawType: 'JP_ZIP_CODE',
  pattern: /(?<![\d-])\d{3}-\d{4}(?![\d-])/g,
  score: 0.6,
  contextWords: ZIP_CONTEXT,
  description: 'Matches Japanese postal codes',
  examples: ['150-0002'],
};

/**
 * US ZIP code. Five-digit numbers are common, so a bare match stays under
 * the default score floor until a context word lifts it.
 */
export const US_ZIP_PATTERN: RecognizerPattern = {
  id: 'us-zip',
  rawType: 'US_ZIP_CODE',
  pattern: /\b\d{5}(?:-\d{4})?\b/g,
  score: 0.4,
  contextWords: ZIP_CONTEXT,
  description: 'Matches US ZIP and ZIP+4 codes',
  examples: ['94105', '94105-1234'],
};

// ============================================================================
// Birth Date Patterns
// ============================================================================

export const SLASH_DATE_PATTERN: RecognizerPattern = {
  id: 'date-slash',
  rawType: 'DATE_OF_BIRTH_JP',
  pattern: /(?<!\d)\d{4}\/\d{1,2}\/\d{1,2}(?!\d)/g,
  score: 0.6,
  contextWords: BIRTH_CONTEXT,
  description: 'Matches yyyy/m/d dates',
  examples: ['1985/4/12'],
  fastCheck: (text) => text.includes('/'),
};

export const HYPHEN_DATE_PATTERN: RecognizerPattern = {
  id: 'date-hyphen',
  rawType: 'DATE_OF_BIRTH_JP',
  pattern: /(?<!\d)\d{4}-\d{1,2}-\d{1,2}(?!\d)/g,
  score: 0.6,
  contextWords: BIRTH_CONTEXT,
  description: 'Matches yyyy-mm-dd dates',
  examples: ['1985-04-12'],
};

export const KANJI_DATE_PATTERN: RecognizerPattern = {
  id: 'date-kanji',
  rawType: 'DATE_OF_BIRTH_JP',
  pattern: /(?<!\d)\d{4}年\d{1,2}月\d{1,2}日/g,
  score: 0.7,
  contextWords: BIRTH_CONTEXT,
  description: 'Matches dates written with 年/月/日',
  examples: ['1985年4月12日'],
  fastCheck: (text) => text.includes('年'),
};

/**
 * Japanese era dates (Showa, Heisei, Reiwa), including the first year 元年
 */
export const ERA_DATE_PATTERN: RecognizerPattern = {
  id: 'date-era',
  rawType: 'DATE_OF_BIRTH_JP',
  pattern: /(?:令和|平成|昭和)(?:\d{1,2}|元)年\d{1,2}月\d{1,2}日/g,
  score: 0.8,
  contextWords: BIRTH_CONTEXT,
  description: 'Matches Japanese era dates',
  examples: ['昭和60年4月12日', '令和元年5月1日'],
  fastCheck: (text) => text.includes('令和') || text.includes('平成') || text.includes('昭和'),
};

// ============================================================================
// Attribute Patterns
// ============================================================================

export const JP_AGE_PATTERN: RecognizerPattern = {
  id: 'jp-age',
  rawType: 'JP_AGE',
  pattern: /(?<!\d)\d{1,3}\s*歳/g,
  score: 0.85,
  contextWords: ['年齢'],
  description: 'Matches ages written with 歳',
  examples: ['42歳', '7 歳'],
  fastCheck: (text) => text.includes('歳'),
  accept: (match) => Number.parseInt(match, 10) <= 120,
};

export const JP_GENDER_BRACKETED_PATTERN: RecognizerPattern = {
  id: 'jp-gender-bracketed',
  rawType: 'JP_GENDER',
  pattern: /[（(]\s*(?:男性|女性|男|女)\s*[）)]/g,
  score: 0.8,
  contextWords: ['性別'],
  description: 'Matches a bracketed gender marker after a name',
  examples: ['（男）', '(女性)'],
  fastCheck: (text) => text.includes('男') || text.includes('女'),
};

export const JP_GENDER_PATTERN: RecognizerPattern = {
  id: 'jp-gender',
  rawType: 'JP_GENDER',
  pattern: /男性|女性/g,
  score: 0.4,
  contextWords: ['性別', 'gender'],
  description: 'Matches 男性/女性; needs a context word to pass the score floor',
  examples: ['性別：女性'],
  fastCheck: (text) => text.includes('性'),
};

export const CUSTOMER_ID_PATTERN: RecognizerPattern = {
  id: 'customer-id',
  rawType: 'CUSTOMER_ID_JP',
  pattern: /\b[A-Z]{1,4}-?\d{5,10}\b/g,
  score: 0.4,
  contextWords: ['顧客番号', '顧客id', '会員番号', 'お客様番号', 'customer', 'member', 'account'],
  description: 'Matches letter-prefixed customer and member numbers',
  examples: ['C-0012345', 'MB20240017'],
};

// ============================================================================
// Pattern Collections
// ============================================================================

/**
 * All built-in recognizer patterns
 */
export const ALL_PATTERNS: readonly RecognizerPattern[] = [
  EMAIL_PATTERN,
  JP_PHONE_PATTERN,
  JP_MOBILE_PATTERN,
  JP_INTERNATIONAL_PHONE_PATTERN,
  US_PHONE_PATTERN,
  JP_ZIP_PATTERN,
  US_ZIP_PATTERN,
  SLASH_DATE_PATTERN,
  HYPHEN_DATE_PATTERN,
  KANJI_DATE_PATTERN,
  ERA_DATE_PATTERN,
  JP_AGE_PATTERN,
  JP_GENDER_BRACKETED_PATTERN,
  JP_GENDER_PATTERN,
  CUSTOMER_ID_PATTERN,
];

/**
 * Create a custom pattern
 */
export function createCustomPattern(
  id: string,
  rawType: string,
  pattern: RegExp,
  score: number,
  contextWords: readonly string[] = []
): RecognizerPattern {
  return {
    id,
    rawType,
    pattern: new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g'),
    score,
    contextWords: contextWords.map((word) => word.toLowerCase()),
    description: `Custom pattern: ${id}`,
    examples: [],
  };
}
