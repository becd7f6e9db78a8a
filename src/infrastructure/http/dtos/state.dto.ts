import { ApiProperty } from '@nestjs/swagger';
import { StateCode } from '../../../domain/enums/state-code.enum';

export class StateListItemDto {
  @ApiProperty({ enum: StateCode, example: StateCode.BE })
  code!: StateCode;

  @ApiProperty({ example: 'Berlin' })
  name_de!: string;

  @ApiProperty({ example: 'bundeslandBE' })
  form_field!: string;
}

export class StateLookupResponseDto extends StateListItemDto {
  @ApiProperty({ description: 'Texto recibido', example: 'berlin' })
  input!: string;
}
