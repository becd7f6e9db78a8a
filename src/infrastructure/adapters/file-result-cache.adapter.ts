import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ResultCachePort } from '../../domain/ports/result-cache.port';

/**
 * Nombre de fichero para una clave: la palabra clave literal, con
 * percent-encoding para que "/" o ".." no salgan del directorio.
 * Sigue siendo 1:1 y sensible a mayúsculas.
 */
export function cacheFileName(key: string): string {
  return encodeURIComponent(key).replace(/\./g, '%2E');
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Caché en disco: un fichero por palabra clave con el HTML crudo.
 * Sin TTL ni límite; escrituras concurrentes a la misma clave: gana la última.
 */
@Injectable()
export class FileResultCache implements ResultCachePort {
  private readonly logger = new Logger(FileResultCache.name);
  private readonly cacheDir: string;

  constructor(private readonly config: ConfigService) {
    this.cacheDir = this.config.get<string>(
      'registry.cacheDir',
      path.join(os.tmpdir(), 'handelsregister_cache'),
    );
  }

  async get(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.pathFor(key), 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async put(key: string, html: string): Promise<void> {
    await fs.mkdir(this.cacheDir, { recursive: true });
    await fs.writeFile(this.pathFor(key), html, 'utf-8');
    this.logger.debug(`💾 Caché actualizada para "${key}" (${html.length} chars)`);
  }

  private pathFor(key: string): string {
    return path.join(this.cacheDir, cacheFileName(key));
  }
}
