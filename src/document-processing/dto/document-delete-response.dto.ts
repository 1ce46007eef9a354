import { ApiProperty } from '@nestjs/swagger';

export class DocumentDeleteResponseDto {
  @ApiProperty()
  documentId!: string;

  @ApiProperty()
  databaseDeleted!: boolean;

  @ApiProperty({
    description: 'False when the stored file was already gone or could not be removed',
  })
  storageDeleted!: boolean;
}
