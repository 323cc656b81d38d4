import { ArrayNotEmpty, IsArray, IsInt, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class ConvertOptionsDto {
  @IsString({ message: 'FILE is required' })
  @IsNotEmpty({ message: 'FILE is required' })
  file!: string;

  @IsString({ message: 'SHEET is required' })
  @IsNotEmpty({ message: 'SHEET is required' })
  sheet!: string;

  @IsString({ message: '--output is required' })
  @IsNotEmpty({ message: '--output is required' })
  output!: string;

  /** Visible-column ordinals, 1-based, in output order. */
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty({ message: '--columns needs at least one column number' })
  @IsInt({ each: true, message: '--columns must list whole numbers' })
  columns?: number[];
}
