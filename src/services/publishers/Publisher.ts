import type { PostConfirmation } from '../../models/Post.js';
import type { Platform } from '../../models/Settings.js';

/**
 * Contrato común de las plataformas donde se publica
 */
export interface Publisher {
  readonly platform: Platform;

  /** Largo máximo del texto del post, medido con `measure` */
  readonly maxLength: number;

  /** Largo del texto tal como lo cuenta la plataforma */
  measure(text: string): number;

  /** Prepara la sesión y verifica las credenciales */
  authenticate(): Promise<void>;

  publish(text: string): Promise<PostConfirmation>;
}
