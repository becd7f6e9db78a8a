import { Body, Controller, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Public } from '../../auth/public.decorator';
import { ServiceThrottlerGuard } from '../../auth/service-throttler.guard';
import { ServiceTokenService } from '../../auth/service-token.service';
import { IssueTokenDto, TokenResponseDto } from '../dtos/token.dto';

@ApiTags('Auth')
@Controller('token')
export class TokenController {
  constructor(private readonly tokens: ServiceTokenService) {}

  /**
   * POST /api/token
   *
   * Emite un token servicio-a-servicio (sin expiración).
   */
  @Public()
  @Post()
  @HttpCode(HttpStatus.OK)
  @UseGuards(ServiceThrottlerGuard)
  @ApiOperation({ summary: 'Generar token de servicio (JWT sin expiración)' })
  @ApiResponse({ status: 200, type: TokenResponseDto })
  issueToken(@Body() dto: IssueTokenDto): TokenResponseDto {
    return {
      token: this.tokens.issue(dto.service_name),
      service: dto.service_name,
    };
  }
}
