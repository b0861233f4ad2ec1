import chalk from 'chalk';
import { createSpinner } from 'nanospinner';
import type { CLIOptions, SetupAction } from './cli/ArgumentParser.js';
import type { SetupWizard } from './cli/SetupWizard.js';
import { hasCredentials, missingCredentials } from './config/credentials.js';
import { EXIT_CODES, HELP_MESSAGES, PLATFORM_NAMES, type ExitCode } from './config/defaults.js';
import type { SettingsStore } from './config/SettingsStore.js';
import type { Period } from './models/Period.js';
import type { Platform, Service, Settings } from './models/Settings.js';
import type { TopArtistEntry } from './models/TopArtist.js';
import type { TopArtistsProvider } from './services/LastfmService.js';
import type { Publisher } from './services/publishers/Publisher.js';
import type { ErrorLogger } from './utils/ErrorLogger.js';
import { CredentialsError, ErrorHandler, PostingError } from './utils/ErrorHandler.js';
import { buildSummaryText, fitSummaryText } from './utils/SummaryText.js';

export interface AppDependencies {
  store: SettingsStore;
  statsProvider: TopArtistsProvider;
  createPublisher: (platform: Platform, settings: Settings) => Publisher;
  setupWizard: Pick<SetupWizard, 'createMastodonApp' | 'createMastodonUserToken'>;
  errorLogger?: ErrorLogger;
  now?: () => Date;
}

const SERVICE_NAMES: Record<Service, string> = {
  lastfm: 'Last.fm',
  ...PLATFORM_NAMES
};

const SERVICE_HELP: Record<Service, string> = {
  lastfm: HELP_MESSAGES.LASTFM_MISSING,
  mastodon: HELP_MESSAGES.MASTODON_MISSING,
  bluesky: HELP_MESSAGES.BLUESKY_MISSING,
  twitter: HELP_MESSAGES.TWITTER_MISSING
};

const SAVE_ACTIONS: Partial<Record<SetupAction, Service>> = {
  'set-lastfm': 'lastfm',
  'set-bluesky': 'bluesky',
  'set-twitter': 'twitter'
};

/**
 * Mezclar las credenciales pasadas por línea de comandos sobre las guardadas
 */
export function applyCliOverrides(settings: Settings, options: CLIOptions): Settings {
  const pick = (override: string | undefined, current: string): string => override || current;

  return {
    lastfm: {
      user: pick(options.user, settings.lastfm.user),
      accessKey: pick(options.accessKey, settings.lastfm.accessKey)
    },
    mastodon: { ...settings.mastodon },
    bluesky: {
      handle: pick(options.blueskyHandle, settings.bluesky.handle),
      password: pick(options.blueskyPassword, settings.bluesky.password)
    },
    twitter: {
      consumerKey: pick(options.twitterConsumerKey, settings.twitter.consumerKey),
      consumerSecret: pick(options.twitterConsumerSecret, settings.twitter.consumerSecret),
      accessToken: pick(options.twitterAccessToken, settings.twitter.accessToken),
      accessSecret: pick(options.twitterAccessSecret, settings.twitter.accessSecret)
    }
  };
}

export class LastShoutApp {
  private errorHandler = new ErrorHandler();
  private now: () => Date;

  constructor(private deps: AppDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Punto de entrada principal: devuelve el código de salida del proceso
   */
  async run(options: CLIOptions): Promise<ExitCode> {
    try {
      const stored = await this.loadSettings();
      const settings = applyCliOverrides(stored, options);

      if (options.setup) {
        return await this.runSetup(options.setup, settings, options);
      }

      return await this.shout(settings, options);
    } catch (error) {
      return this.handleError(error);
    }
  }

  private async loadSettings(): Promise<Settings> {
    const { store } = this.deps;

    if (!(await store.exists())) {
      console.log(chalk.cyan('📁 Creando archivo de configuración en ') + chalk.white(store.settingsPath));
    }

    return store.load();
  }

  /**
   * Guardar credenciales o correr un flujo interactivo, y terminar
   */
  private async runSetup(action: SetupAction, settings: Settings, options: CLIOptions): Promise<ExitCode> {
    const service = SAVE_ACTIONS[action];
    let updated: Settings;

    if (service) {
      this.ensureCredentials(settings, service, 'No se guardó nada');
      updated = settings;
    } else if (action === 'create-mastodon-app') {
      updated = await this.deps.setupWizard.createMastodonApp(settings, options.mastodonUrl);
    } else {
      updated = await this.deps.setupWizard.createMastodonUserToken(settings);
    }

    await this.deps.store.save(updated);

    const label = service ? SERVICE_NAMES[service] : SERVICE_NAMES.mastodon;
    console.log(chalk.green(`✅ Credenciales de ${label} guardadas en `) + chalk.cyan(this.deps.store.settingsPath));
    return EXIT_CODES.SUCCESS;
  }

  /**
   * Obtener los artistas, armar el texto y publicarlo en cada plataforma pedida
   */
  private async shout(settings: Settings, options: CLIOptions): Promise<ExitCode> {
    // Todo se valida antes de tocar la red
    this.ensureCredentials(settings, 'lastfm');
    options.targets.forEach(platform => this.ensureCredentials(settings, platform));

    const entries = await this.fetchTopArtists(settings, options.number, options.period);
    const now = this.now();
    const summary = buildSummaryText(entries, options.period, now);

    if (!summary) {
      console.log(chalk.yellow(`⚠️  No hay resultados para ${settings.lastfm.user} en el período ${options.period}. No se publica nada.`));
      return EXIT_CODES.SUCCESS;
    }

    console.log('\n' + chalk.white(summary) + '\n');

    if (options.targets.length === 0) {
      console.log(chalk.gray('Usá --toot, --skeet o --tweet para publicarlo.'));
      return EXIT_CODES.SUCCESS;
    }

    for (const platform of options.targets) {
      await this.publishTo(platform, settings, entries, options.period, now, summary);
    }

    console.log(chalk.green('\n✅ ¡Listo!'));
    return EXIT_CODES.SUCCESS;
  }

  private async fetchTopArtists(settings: Settings, limit: number, period: Period): Promise<TopArtistEntry[]> {
    const { user, accessKey } = settings.lastfm;
    const spinner = createSpinner(`Consultando los artistas de ${user} en Last.fm...`).start();

    try {
      const entries = await this.deps.statsProvider.getTopArtists(accessKey, user, limit, period);
      spinner.success({ text: `${entries.length} artistas encontrados` });
      return entries;
    } catch (error) {
      spinner.error({ text: 'No se pudieron obtener los artistas' });
      throw this.errorHandler.classifyFetchError(error, user);
    }
  }

  private async publishTo(
    platform: Platform,
    settings: Settings,
    entries: TopArtistEntry[],
    period: Period,
    now: Date,
    summary: string
  ): Promise<void> {
    const publisher = this.deps.createPublisher(platform, settings);
    const name = PLATFORM_NAMES[platform];

    const text = fitSummaryText(entries, period, publisher.maxLength, now, value => publisher.measure(value));
    if (text === null) {
      throw new PostingError(`El texto no entra en los ${publisher.maxLength} caracteres de ${name}`, platform, 'validation');
    }
    if (text !== summary) {
      console.log(chalk.yellow(`✂️  Lista recortada para entrar en ${publisher.maxLength} caracteres de ${name}`));
    }

    const spinner = createSpinner(`Publicando en ${name}...`).start();
    try {
      await publisher.authenticate();
      const confirmation = await publisher.publish(text);
      const where = confirmation.url ? ` → ${confirmation.url}` : '';
      spinner.success({ text: `Publicado en ${name}${where}` });
    } catch (error) {
      spinner.error({ text: `Falló la publicación en ${name}` });
      throw this.errorHandler.classifyPostingError(error, platform);
    }
  }

  private ensureCredentials(settings: Settings, service: Service, suffix?: string): void {
    if (hasCredentials(settings, service)) {
      return;
    }

    const detail = suffix ? `. ${suffix}` : '';
    throw new CredentialsError(
      `Faltan credenciales de ${SERVICE_NAMES[service]}${detail}`,
      service,
      missingCredentials(settings, service)
    );
  }

  private async handleError(error: unknown): Promise<ExitCode> {
    const appError = this.errorHandler.toLastShoutError(error);

    const axiosError = this.errorHandler.axiosErrorOf(appError);
    if (axiosError && this.deps.errorLogger) {
      await this.deps.errorLogger.logHttpError(axiosError, appError.code);
    }

    console.error(chalk.red('\n❌ ' + this.errorHandler.friendlyMessage(appError)));

    if (appError instanceof CredentialsError) {
      console.error(chalk.gray(SERVICE_HELP[appError.service]));
    }

    return appError.exitCode;
  }
}
