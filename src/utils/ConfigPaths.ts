import os from 'os';
import path from 'path';
import { DEFAULT_CONFIG } from '../config/defaults.js';

/**
 * Utilidad para manejar rutas de configuración del sistema
 */
export class ConfigPaths {
    /**
     * Obtiene la ruta del directorio de configuración de la aplicación
     */
    static getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
        const platform = os.platform();

        if (platform === 'win32') {
            const appData = env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
            return path.join(appData, DEFAULT_CONFIG.WINDOWS_APP_NAME);
        }

        // Linux, macOS y otros Unix siguen XDG
        const xdgConfigHome = env.XDG_CONFIG_HOME?.trim();
        const base = xdgConfigHome && path.isAbsolute(xdgConfigHome)
            ? xdgConfigHome
            : path.join(os.homedir(), '.config');

        return path.join(base, DEFAULT_CONFIG.APP_NAME);
    }

    /**
     * Obtiene la ruta del archivo de settings
     */
    static getSettingsPath(configDir: string = this.getConfigDir()): string {
        return path.join(configDir, DEFAULT_CONFIG.SETTINGS_FILE);
    }

    /**
     * Obtiene la ruta del directorio de logs
     */
    static getLogsDir(configDir: string = this.getConfigDir()): string {
        return path.join(configDir, 'logs');
    }
}
