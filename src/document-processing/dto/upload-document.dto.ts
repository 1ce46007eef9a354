import { ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayMaxSize,
  IsArray,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';

/**
 * Multipart form fields sent alongside uploaded files. Shared by the single
 * and batch upload endpoints.
 */
export class UploadDocumentDto {
  @ApiPropertyOptional({
    description: 'Optional description applied to every uploaded document',
    maxLength: 500,
  })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  description?: string;

  @ApiPropertyOptional({
    description: 'Comma-separated tags',
    type: String,
    example: 'urgente,2024',
  })
  @IsOptional()
  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((tag) => tag.trim())
          .filter((tag) => tag.length > 0)
      : value,
  )
  @IsArray()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  @MaxLength(50, { each: true })
  tags?: string[];

  @ApiPropertyOptional({ description: 'Owner of the uploaded documents' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  userId?: string;
}
