import { ApiProperty } from '@nestjs/swagger';

// ──────────────────────────────────────────────────────────
// Response DTOs: solo para documentar la forma del JSON
// ──────────────────────────────────────────────────────────

export class CompanyHistoryEntryDto {
  @ApiProperty({ example: 'Gasag Berliner Gaswerke AG' })
  name!: string;

  @ApiProperty({ example: 'Berlin' })
  location!: string;
}

export class CompanyResponseDto {
  @ApiProperty({ example: 'Berlin  District court Berlin (Charlottenburg) HRB 44343' })
  court!: string;

  @ApiProperty({ example: 'HRB 44343 B', nullable: true, type: String })
  registerNumber!: string | null;

  @ApiProperty({ example: 'GASAG AG' })
  name!: string;

  @ApiProperty({ example: 'Berlin' })
  state!: string;

  @ApiProperty({ example: 'currently registered' })
  status!: string;

  @ApiProperty({ example: 'CURRENTLY_REGISTERED' })
  statusNormalized!: string;

  @ApiProperty({ example: 'ADCDHDDKUTVÖSI' })
  documentsInfo!: string;

  @ApiProperty({ type: [CompanyHistoryEntryDto] })
  history!: CompanyHistoryEntryDto[];
}
