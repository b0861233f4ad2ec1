import chalk from 'chalk';
import { createSpinner } from 'nanospinner';
import { MastodonAuthManager } from '../auth/MastodonAuthManager.js';
import { hasMastodonAppCredentials, hasMastodonUserCredentials } from '../config/credentials.js';
import type { Settings } from '../models/Settings.js';
import { SetupError, ValidationError } from '../utils/ErrorHandler.js';
import type { Prompter } from './Prompter.js';

const DEFAULT_INSTANCE = 'https://mastodon.social';

/**
 * Flujos interactivos de configuración de Mastodon.
 * Devuelven los settings actualizados; guardarlos queda a cargo del llamador.
 */
export class SetupWizard {
  constructor(
    private prompter: Prompter,
    private authManager: MastodonAuthManager = new MastodonAuthManager()
  ) {}

  /**
   * Registrar la app en la instancia y guardar client_id/client_secret
   */
  async createMastodonApp(settings: Settings, instanceUrl?: string): Promise<Settings> {
    console.log(chalk.bold.blue('\n🐘 Registro de la app en Mastodon'));
    console.log(chalk.gray('─'.repeat(40)));

    const input = instanceUrl
      || settings.mastodon.apiBaseUrl
      || await this.prompter.input('URL de tu instancia de Mastodon:', { default: DEFAULT_INSTANCE });

    let apiBaseUrl: string;
    try {
      apiBaseUrl = MastodonAuthManager.normalizeInstanceUrl(input);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new SetupError(error.message, error);
      }
      throw error;
    }

    const spinner = createSpinner(`Registrando la app en ${apiBaseUrl}...`).start();
    try {
      const app = await this.authManager.registerApp(apiBaseUrl);
      spinner.success({ text: `App registrada en ${apiBaseUrl}` });

      // Un token de otra instancia ya no sirve
      const userToken = apiBaseUrl === settings.mastodon.apiBaseUrl ? settings.mastodon.userToken : '';

      console.log(chalk.white('\nSiguiente paso: ') + chalk.cyan('last-shout --create-mastodon-user'));

      return {
        ...settings,
        mastodon: {
          apiBaseUrl,
          clientId: app.clientId,
          clientSecret: app.clientSecret,
          userToken
        }
      };
    } catch (error) {
      spinner.error({ text: 'No se pudo registrar la app' });
      throw error;
    }
  }

  /**
   * Autorizar la app en el navegador y cambiar el código por un token de usuario
   */
  async createMastodonUserToken(settings: Settings): Promise<Settings> {
    if (!hasMastodonAppCredentials(settings)) {
      throw new SetupError('Faltan las credenciales de la app de Mastodon. Ejecutá primero --create-mastodon-app');
    }

    const authUrl = this.authManager.buildAuthorizationUrl(settings.mastodon.apiBaseUrl, settings.mastodon.clientId);

    console.log(chalk.bold.blue('\n🔐 Autorización de Usuario de Mastodon Requerida'));
    console.log(chalk.gray('═'.repeat(40)));
    console.log('Para publicar en tu cuenta, necesitás autorizar esta aplicación.');
    console.log('\n📋 Permisos solicitados:');
    console.log('  • Publicar estados');
    console.log('  • Leer la información de tu cuenta');

    if (hasMastodonUserCredentials(settings)) {
      console.log(chalk.yellow('\n⚠️  Ya hay un token de usuario guardado: se va a reemplazar.'));
    }

    const opened = await this.authManager.openBrowser(authUrl);
    if (opened) {
      console.log('\n🌐 Se abrió el navegador para la autorización.');
    }
    console.log(`Si el navegador no se abre automáticamente, visitá:\n${chalk.cyan(authUrl)}\n`);

    const code = await this.prompter.input('Pegá el código de autorización:');
    if (!code) {
      throw new SetupError('No se ingresó ningún código de autorización');
    }

    const spinner = createSpinner('Intercambiando código por token...').start();
    try {
      const userToken = await this.authManager.exchangeCodeForToken(settings.mastodon, code);
      spinner.success({ text: '¡Token de usuario de Mastodon obtenido exitosamente!' });

      return {
        ...settings,
        mastodon: { ...settings.mastodon, userToken }
      };
    } catch (error) {
      spinner.error({ text: 'No se pudo obtener el token' });
      throw error;
    }
  }
}
