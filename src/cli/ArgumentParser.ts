import { DEFAULT_CONFIG, PLATFORM_ORDER } from '../config/defaults.js';
import { isPeriod, PERIODS, type Period } from '../models/Period.js';
import type { Platform } from '../models/Settings.js';
import { ValidationError } from '../utils/ErrorHandler.js';

export type SetupAction =
  | 'set-lastfm'
  | 'set-bluesky'
  | 'set-twitter'
  | 'create-mastodon-app'
  | 'create-mastodon-user';

type StringOption =
  | 'user'
  | 'accessKey'
  | 'mastodonUrl'
  | 'blueskyHandle'
  | 'blueskyPassword'
  | 'twitterConsumerKey'
  | 'twitterConsumerSecret'
  | 'twitterAccessToken'
  | 'twitterAccessSecret'
  | 'configDir';

export interface CLIOptions extends Partial<Record<StringOption, string>> {
  number: number;
  period: Period;
  setup: SetupAction | null;
  targets: Platform[];
  help: boolean;
  version: boolean;
}

const STRING_FLAGS = new Map<string, StringOption>([
  ['-u', 'user'],
  ['--user', 'user'],
  ['-k', 'accessKey'],
  ['--access-key', 'accessKey'],
  ['--last-access-key', 'accessKey'],
  ['--mastodon-url', 'mastodonUrl'],
  ['--bluesky-handle', 'blueskyHandle'],
  ['--bluesky-password', 'blueskyPassword'],
  ['--twitter-consumer-key', 'twitterConsumerKey'],
  ['--twitter-consumer-secret', 'twitterConsumerSecret'],
  ['--twitter-access-token', 'twitterAccessToken'],
  ['--twitter-access-secret', 'twitterAccessSecret'],
  ['--config-dir', 'configDir']
]);

const SETUP_FLAGS = new Map<string, SetupAction>([
  ['--set-lastfm', 'set-lastfm'],
  ['--set-bluesky', 'set-bluesky'],
  ['--set-twitter', 'set-twitter'],
  ['--create-app', 'create-mastodon-app'],
  ['--create-mastodon-app', 'create-mastodon-app'],
  ['--create-user-token', 'create-mastodon-user'],
  ['--create-mastodon-user', 'create-mastodon-user']
]);

const TARGET_FLAGS = new Map<string, Platform>([
  ['--post-mastodon', 'mastodon'],
  ['--toot', 'mastodon'],
  ['--post-bluesky', 'bluesky'],
  ['--skeet', 'bluesky'],
  ['--post-twitter', 'twitter'],
  ['--tweet', 'twitter'],
  ['-t', 'twitter']
]);

/**
 * Parse command line arguments (sin el "node" ni el script)
 */
export function parseArguments(args: string[]): CLIOptions {
  const options: CLIOptions = {
    number: DEFAULT_CONFIG.NUMBER_OF_ARTISTS,
    period: DEFAULT_CONFIG.PERIOD,
    setup: null,
    targets: [],
    help: false,
    version: false
  };
  const setups = new Set<SetupAction>();
  const targets = new Set<Platform>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // --flag=valor
    const equalsAt = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = equalsAt === -1 ? arg : arg.slice(0, equalsAt);
    const inlineValue = equalsAt === -1 ? undefined : arg.slice(equalsAt + 1);

    const takeValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const next = args[i + 1];
      if (next === undefined) {
        throw new ValidationError(`Falta el valor de ${flag}`);
      }
      i++; // Skip next argument
      return next;
    };

    const rejectValue = (): void => {
      if (inlineValue !== undefined) {
        throw new ValidationError(`${flag} no acepta un valor`);
      }
    };

    switch (flag) {
      case '-h':
      case '--help':
        rejectValue();
        options.help = true;
        return options;

      case '-V':
      case '--version':
        rejectValue();
        options.version = true;
        return options;

      case '-n':
      case '--number':
        options.number = parseNumber(takeValue());
        break;

      case '-p':
      case '--period':
        options.period = parsePeriod(takeValue());
        break;

      default: {
        const stringOption = STRING_FLAGS.get(flag);
        if (stringOption) {
          options[stringOption] = takeValue();
          break;
        }

        const setup = SETUP_FLAGS.get(flag);
        if (setup) {
          rejectValue();
          setups.add(setup);
          break;
        }

        const target = TARGET_FLAGS.get(flag);
        if (target) {
          rejectValue();
          targets.add(target);
          break;
        }

        throw new ValidationError(`Opción desconocida: ${arg}`);
      }
    }
  }

  options.setup = validateActions(Array.from(setups), Array.from(targets));
  options.targets = PLATFORM_ORDER.filter(platform => targets.has(platform));

  return options;
}

export function parseNumber(value: string): number {
  const { MIN_NUMBER_OF_ARTISTS: min, MAX_NUMBER_OF_ARTISTS: max } = DEFAULT_CONFIG;

  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new ValidationError(`El número de artistas debe ser un entero entre ${min} y ${max} (recibido: "${value}")`);
  }

  const number = Number.parseInt(value, 10);
  if (number < min || number > max) {
    throw new ValidationError(`El número de artistas debe estar entre ${min} y ${max} (recibido: ${number})`);
  }
  return number;
}

export function parsePeriod(value: string): Period {
  if (!isPeriod(value)) {
    throw new ValidationError(`Período inválido: "${value}". Opciones: ${PERIODS.join(' | ')}`);
  }
  return value;
}

/**
 * Como mucho una acción de configuración, y nunca junto con una publicación
 */
export function validateActions(setups: SetupAction[], targets: Platform[]): SetupAction | null {
  if (setups.length > 1) {
    throw new ValidationError(`Solo se puede pedir una acción de configuración a la vez (recibidas: ${setups.join(', ')})`);
  }

  const setup = setups[0] ?? null;
  if (setup && targets.length > 0) {
    throw new ValidationError(`--${setup} no se puede combinar con una publicación`);
  }
  return setup;
}
