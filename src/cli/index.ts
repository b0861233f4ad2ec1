#!/usr/bin/env node

import chalk from 'chalk';
import chalkAnimation from 'chalk-animation';
import figlet from 'figlet';
import { readFileSync } from 'fs';
import gradient from 'gradient-string';
import { EXIT_CODES, HELP_MESSAGES, type ExitCode } from '../config/defaults.js';
import { SettingsStore } from '../config/SettingsStore.js';
import { LastShoutApp } from '../LastShoutApp.js';
import { PERIODS } from '../models/Period.js';
import { LastfmService } from '../services/LastfmService.js';
import { createPublisher } from '../services/publishers/index.js';
import { ConfigPaths } from '../utils/ConfigPaths.js';
import { ErrorLogger } from '../utils/ErrorLogger.js';
import { ValidationError } from '../utils/ErrorHandler.js';
import { parseArguments, type CLIOptions } from './ArgumentParser.js';
import { InquirerPrompter } from './Prompter.js';
import { SetupWizard } from './SetupWizard.js';

export class LastShoutCLI {
    constructor(private options: CLIOptions) {}

    async main(): Promise<ExitCode> {
        if (this.options.help) {
            LastShoutCLI.showHelp();
            return EXIT_CODES.SUCCESS;
        }

        if (this.options.version) {
            console.log(`last-shout ${LastShoutCLI.getVersion()}`);
            return EXIT_CODES.SUCCESS;
        }

        // Los flujos interactivos arrancan con el título
        if (this.options.setup === 'create-mastodon-app' || this.options.setup === 'create-mastodon-user') {
            await this.showWelcome();
        }

        const store = new SettingsStore(this.options.configDir);
        const app = new LastShoutApp({
            store,
            statsProvider: new LastfmService(),
            createPublisher,
            setupWizard: new SetupWizard(new InquirerPrompter()),
            errorLogger: new ErrorLogger(ConfigPaths.getLogsDir(store.configDir))
        });

        return app.run(this.options);
    }

    async showWelcome(): Promise<void> {
        const title = figlet.textSync('last-shout', {
            font: 'Standard',
            horizontalLayout: 'default',
            verticalLayout: 'default'
        });

        const rainbowTitle = chalkAnimation.rainbow(title);
        await this.sleep(1000);
        rainbowTitle.stop();

        console.log(chalk.gray('─'.repeat(60)));
    }

    /**
     * Display help information
     */
    static showHelp(): void {
        const defaultConfigDir = ConfigPaths.getConfigDir();

        console.log('\n' + gradient.pastel.multiline(figlet.textSync('last-shout', { font: 'Small' })));
        console.log(chalk.bold(`\n${HELP_MESSAGES.WELCOME}`) + chalk.gray(`: ${HELP_MESSAGES.DESCRIPTION}\n`));
        console.log('Uso: last-shout [opciones]\n');
        console.log(chalk.bold('Last.fm:'));
        console.log('  -u, --user <usuario>              Usuario de Last.fm');
        console.log('  -k, --access-key <key>            API key de Last.fm (alias: --last-access-key)');
        console.log('  -n, --number <num>                Cantidad de artistas, 1-1000 (por defecto: 10)');
        console.log(`  -p, --period <período>            ${PERIODS.join(' | ')} (por defecto: 7day)`);
        console.log('      --set-lastfm                  Guardar las credenciales de Last.fm y salir\n');
        console.log(chalk.bold('Mastodon:'));
        console.log('      --create-mastodon-app         Registrar la app en la instancia (alias: --create-app)');
        console.log('      --mastodon-url <url>          Instancia a usar al registrar la app');
        console.log('      --create-mastodon-user        Obtener el token de usuario (alias: --create-user-token)');
        console.log('      --toot, --post-mastodon       Publicar en Mastodon\n');
        console.log(chalk.bold('Bluesky:'));
        console.log('      --bluesky-handle <handle>     Handle de Bluesky');
        console.log('      --bluesky-password <pass>     App password de Bluesky');
        console.log('      --set-bluesky                 Guardar las credenciales de Bluesky y salir');
        console.log('      --skeet, --post-bluesky       Publicar en Bluesky\n');
        console.log(chalk.bold('Twitter:'));
        console.log('      --twitter-consumer-key <k>    Consumer key de la app');
        console.log('      --twitter-consumer-secret <s> Consumer secret de la app');
        console.log('      --twitter-access-token <t>    Access token del usuario');
        console.log('      --twitter-access-secret <s>   Access secret del usuario');
        console.log('      --set-twitter                 Guardar las credenciales de Twitter y salir');
        console.log('  -t, --tweet, --post-twitter       Publicar en Twitter\n');
        console.log(chalk.bold('General:'));
        console.log('      --config-dir <ruta>           Directorio de configuración');
        console.log(`                                    (por defecto: ${defaultConfigDir})`);
        console.log('  -V, --version                     Mostrar la versión');
        console.log('  -h, --help                        Mostrar este mensaje de ayuda\n');
        console.log('Ejemplos:');
        console.log('  last-shout --user mi_usuario --access-key <key> --set-lastfm');
        console.log('  last-shout -n 5 -p 1month');
        console.log('  last-shout -p 12month --toot --skeet\n');
    }

    static getVersion(): string {
        try {
            const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf8');
            const pkg: unknown = JSON.parse(raw);
            if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
                return pkg.version;
            }
        } catch (error) {
            console.warn(chalk.yellow('⚠️  No se pudo leer la versión:'), error instanceof Error ? error.message : error);
        }
        return 'desconocida';
    }

    /**
     * Utility function to pause execution
     */
    private sleep(ms: number = 1000): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }
}

// Main execution
async function main(): Promise<ExitCode> {
    let options: CLIOptions;
    try {
        options = parseArguments(process.argv.slice(2));
    } catch (error) {
        if (error instanceof ValidationError) {
            console.error(chalk.red(`❌ ${error.message}`));
            console.error(chalk.gray('Usá --help para ver las opciones.'));
            return error.exitCode;
        }
        throw error;
    }

    const cli = new LastShoutCLI(options);
    return cli.main();
}

process.on('SIGINT', () => {
    console.log(chalk.yellow('\n👋 Cancelado'));
    process.exit(EXIT_CODES.CANCELLED);
});

main()
    .then((code) => process.exit(code))
    .catch((error) => {
        console.error(chalk.red('Error fatal:'), error);
        process.exit(EXIT_CODES.UNEXPECTED_ERROR);
    });
