import { ApiProperty } from '@nestjs/swagger';
import { DocumentResponseDto } from './document-response.dto';

export class DocumentListResponseDto {
  @ApiProperty({ type: [DocumentResponseDto] })
  data!: DocumentResponseDto[];

  @ApiProperty()
  total!: number;

  @ApiProperty()
  hasNextPage!: boolean;
}
