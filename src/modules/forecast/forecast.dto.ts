import {
  ArrayNotEmpty,
  IsArray,
  IsOptional,
  IsString,
  Matches,
} from 'class-validator';

export class ForecastRequestDto {
  /** [[latitude, longitude], ...]; ranges are checked by the planner */
  @IsArray()
  @ArrayNotEmpty()
  coordinates!: unknown[];

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  variables!: string[];

  @IsString()
  @Matches(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/, {
    message: 'timestamp must be in YYYY-MM-DD HH:MM:SS format',
  })
  timestamp!: string;

  @IsOptional()
  @IsString()
  timezone?: string;
}
