import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsIn, IsNotEmpty, IsOptional, IsString, ValidationArguments } from 'class-validator';
import { Transform } from 'class-transformer';
import { MATCH_MODE_VALUES, MatchMode } from '../../../domain/enums/match-mode.enum';
import { IsStateCodeList } from '../validation/is-state-code-list.decorator';

const MISSING_KEYWORDS = 'Missing required parameter: keywords';

/** Ausente → mismo mensaje que IsNotEmpty; repetido (array) u otro tipo → error propio */
function keywordsTypeMessage({ value }: ValidationArguments): string {
  return value === undefined || value === null
    ? MISSING_KEYWORDS
    : 'Invalid keywords parameter: must be a single string';
}

/** "BE, hh" → ["BE", "HH"]; también acepta el parámetro repetido */
function parseStateList(raw: unknown): string[] | undefined {
  if (raw === undefined || raw === null) return undefined;
  const parts = Array.isArray(raw) ? raw.map(String) : [String(raw)];
  return parts
    .flatMap((part) => part.split(','))
    .map((code) => code.trim().toUpperCase())
    .filter((code) => code.length > 0);
}

/** Solo "true" (sin distinguir mayúsculas) es verdadero */
function parseFlag(raw: unknown): boolean | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw === 'boolean') return raw;
  return String(raw).toLowerCase() === 'true';
}

/**
 * Parámetros de GET /api/search.
 * Validado con class-validator; los errores salen como 400 con `validValues`.
 */
export class SearchRegistryDto {
  @ApiProperty({
    description: 'Palabras clave; también es la clave de caché (literal, sensible a mayúsculas)',
    example: 'Gasag AG',
  })
  @IsNotEmpty({ message: MISSING_KEYWORDS })
  @IsString({ message: keywordsTypeMessage })
  keywords!: string;

  @ApiPropertyOptional({
    description: 'all = todas las palabras; min = al menos una; exact = nombre exacto',
    enum: MatchMode,
    default: MatchMode.ALL,
  })
  @IsOptional()
  @IsIn(MATCH_MODE_VALUES, {
    message: `Invalid mode parameter. Must be one of: ${MATCH_MODE_VALUES.join(', ')}`,
    context: { validValues: [...MATCH_MODE_VALUES] },
  })
  mode?: MatchMode;

  @ApiPropertyOptional({
    description: 'Códigos de Bundesland separados por comas',
    type: String,
    example: 'BE,HH',
  })
  @IsOptional()
  @Transform(({ obj, key }) => parseStateList(obj[key]))
  @IsStateCodeList()
  bundesland?: string[];

  @ApiPropertyOptional({ description: 'Ignorar la caché y consultar el portal', default: false })
  @IsOptional()
  @Transform(({ obj, key }) => parseFlag(obj[key]))
  @IsBoolean()
  force?: boolean;

  @ApiPropertyOptional({ description: 'Log detallado del intercambio con el portal', default: false })
  @IsOptional()
  @Transform(({ obj, key }) => parseFlag(obj[key]))
  @IsBoolean()
  debug?: boolean;
}
