import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, ValidationArguments } from 'class-validator';

const MISSING_SERVICE_NAME = 'Missing service_name in request body';

function serviceNameTypeMessage({ value }: ValidationArguments): string {
  return value === undefined || value === null
    ? MISSING_SERVICE_NAME
    : 'Invalid service_name: must be a string';
}

/**
 * Cuerpo de POST /api/token.
 */
export class IssueTokenDto {
  @ApiProperty({ description: 'Nombre del servicio que pide el token', example: 'crm-sync' })
  @IsNotEmpty({ message: MISSING_SERVICE_NAME })
  @IsString({ message: serviceNameTypeMessage })
  service_name!: string;
}

export class TokenResponseDto {
  @ApiProperty({ description: 'JWT HS256 sin expiración' })
  token!: string;

  @ApiProperty({ example: 'crm-sync' })
  service!: string;
}
