import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Public } from '../../auth/public.decorator';
import {
  RequestValidationError,
  StateNotFoundError,
} from '../../../domain/errors/registry.errors';
import {
  listStates,
  resolveStateCode,
  stateFormField,
  stateNameDe,
} from '../../../domain/states/state-registry';
import { StateListItemDto, StateLookupResponseDto } from '../dtos/state.dto';

@ApiTags('Bundesland')
@Public()
@Controller('bundesland')
export class StatesController {
  /**
   * GET /api/bundesland?name=Bavaria
   *
   * Nombre (alemán o inglés) o código → código del Bundesland.
   */
  @Get()
  @ApiOperation({ summary: 'Resolver un Bundesland por nombre (alemán o inglés)' })
  @ApiQuery({ name: 'name', example: 'North Rhine-Westphalia' })
  @ApiResponse({ status: 200, type: StateLookupResponseDto })
  @ApiResponse({ status: 404, description: 'Nombre desconocido (incluye `hint`)' })
  resolveState(@Query('name') name?: string): StateLookupResponseDto {
    if (typeof name !== 'string' || !name) {
      throw new RequestValidationError('Missing required parameter: name');
    }

    const code = resolveStateCode(name);
    if (!code) throw new StateNotFoundError(name);

    return {
      code,
      name_de: stateNameDe(code),
      input: name,
      form_field: stateFormField(code),
    };
  }

  /**
   * GET /api/bundesland/list
   */
  @Get('list')
  @ApiOperation({ summary: 'Listar los 16 Bundesländer con su código' })
  @ApiResponse({ status: 200, type: [StateListItemDto] })
  listStates(): StateListItemDto[] {
    return listStates().map(({ code, nameDe }) => ({
      code,
      name_de: nameDe,
      form_field: stateFormField(code),
    }));
  }
}
