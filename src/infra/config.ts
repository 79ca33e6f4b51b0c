// Load environment variables from .env
import 'dotenv/config';

export interface ServiceConfig {
  logLevel: string;

  // Feature flags
  features: {
    enforceChildAccompaniment: boolean;
  };

  // Pricing stub
  markupPercentage: number;
}

export interface PricingConfig {
  netPrice: number;
  netCurrency: string;
  markupPercentage: number;
  exchangeRate: number;
  hotelCodeSupplier: string;
}

export interface AvailDefaults {
  languageCode: string;
  currency: string;
  nationality: string;
  market: string;
}

export interface AvailRules {
  allowedCurrencies: ReadonlySet<string>;
  allowedNationalities: ReadonlySet<string>;
  allowedMarkets: ReadonlySet<string>;
  allowedLanguages: ReadonlySet<string>;

  maxDestinations: number;
  maxRooms: number;
  maxGuestsPerRoom: number;
  maxOptionsQuota: number;
  defaultOptionsQuota: number;
  maxChildAge: number;

  // Start date must fall strictly after today + startDateLeadDays
  startDateLeadDays: number;
  minStayNights: number;

  defaults: Readonly<AvailDefaults>;
  enforceChildAccompaniment: boolean;
  pricing: Readonly<PricingConfig>;
}

export interface AvailRulesOverrides {
  allowedCurrencies?: Iterable<string>;
  allowedNationalities?: Iterable<string>;
  allowedMarkets?: Iterable<string>;
  allowedLanguages?: Iterable<string>;
  maxDestinations?: number;
  maxRooms?: number;
  maxGuestsPerRoom?: number;
  maxOptionsQuota?: number;
  defaultOptionsQuota?: number;
  maxChildAge?: number;
  startDateLeadDays?: number;
  minStayNights?: number;
  defaults?: Partial<AvailDefaults>;
  enforceChildAccompaniment?: boolean;
  pricing?: Partial<PricingConfig>;
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue: string = ''): string {
  return env[key] || defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  return value ? value.toLowerCase() === 'true' || value === '1' : defaultValue;
}

function defaultLogLevel(env: Env): string {
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export function loadServiceConfig(env: Env = process.env): ServiceConfig {
  return {
    logLevel: getEnvVar(env, 'LOG_LEVEL', defaultLogLevel(env)),
    features: {
      enforceChildAccompaniment: getEnvBoolean(env, 'AVAIL_ENFORCE_CHILD_ACCOMPANIMENT', false),
    },
    markupPercentage: getEnvNumber(env, 'AVAIL_MARKUP_PERCENTAGE', 3.2),
  };
}

const BASE_RULES = {
  allowedCurrencies: ['EUR', 'USD', 'GBP'],
  allowedNationalities: ['US', 'GB', 'CA'],
  allowedMarkets: ['US', 'GB', 'CA', 'ES'],
  allowedLanguages: ['en', 'fr', 'de', 'es'],
  maxDestinations: 10,
  maxRooms: 5,
  maxGuestsPerRoom: 5,
  maxOptionsQuota: 50,
  defaultOptionsQuota: 20,
  maxChildAge: 5,
  startDateLeadDays: 2,
  minStayNights: 3,
  defaults: {
    languageCode: 'en',
    currency: 'EUR',
    nationality: 'US',
    market: 'ES',
  },
  pricing: {
    netPrice: 132.42,
    netCurrency: 'USD',
    markupPercentage: 3.2,
    exchangeRate: 1.0,
    hotelCodeSupplier: '39971881',
  },
} as const;

/**
 * Build the immutable rule set shared by the validator and the response builder.
 * Overrides replace the matching base value; allow-lists are replaced wholesale.
 */
export function createAvailRules(overrides: AvailRulesOverrides = {}): AvailRules {
  const rules: AvailRules = {
    allowedCurrencies: new Set<string>(overrides.allowedCurrencies ?? BASE_RULES.allowedCurrencies),
    allowedNationalities: new Set<string>(overrides.allowedNationalities ?? BASE_RULES.allowedNationalities),
    allowedMarkets: new Set<string>(overrides.allowedMarkets ?? BASE_RULES.allowedMarkets),
    allowedLanguages: new Set<string>(overrides.allowedLanguages ?? BASE_RULES.allowedLanguages),
    maxDestinations: overrides.maxDestinations ?? BASE_RULES.maxDestinations,
    maxRooms: overrides.maxRooms ?? BASE_RULES.maxRooms,
    maxGuestsPerRoom: overrides.maxGuestsPerRoom ?? BASE_RULES.maxGuestsPerRoom,
    maxOptionsQuota: overrides.maxOptionsQuota ?? BASE_RULES.maxOptionsQuota,
    defaultOptionsQuota: overrides.defaultOptionsQuota ?? BASE_RULES.defaultOptionsQuota,
    maxChildAge: overrides.maxChildAge ?? BASE_RULES.maxChildAge,
    startDateLeadDays: overrides.startDateLeadDays ?? BASE_RULES.startDateLeadDays,
    minStayNights: overrides.minStayNights ?? BASE_RULES.minStayNights,
    defaults: Object.freeze({ ...BASE_RULES.defaults, ...overrides.defaults }),
    enforceChildAccompaniment: overrides.enforceChildAccompaniment ?? false,
    pricing: Object.freeze({ ...BASE_RULES.pricing, ...overrides.pricing }),
  };
  return Object.freeze(rules);
}

/**
 * Rule set for this process: base rules with the env-driven flags applied.
 */
export function rulesFromServiceConfig(config: ServiceConfig): AvailRules {
  return createAvailRules({
    enforceChildAccompaniment: config.features.enforceChildAccompaniment,
    pricing: { markupPercentage: config.markupPercentage },
  });
}

export const config: ServiceConfig = loadServiceConfig();
