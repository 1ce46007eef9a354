import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class CreateDocumentsTable1770000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'documents',
        columns: [
          { name: 'id', type: 'uuid', isPrimary: true },
          { name: 'processing_id', type: 'uuid', isNullable: false },
          { name: 'batch_id', type: 'uuid', isNullable: true },
          { name: 'batch_index', type: 'integer', isNullable: true },
          {
            name: 'file_name',
            type: 'varchar',
            length: '255',
            isNullable: false,
          },
          {
            name: 'content_type',
            type: 'varchar',
            length: '100',
            isNullable: false,
          },
          { name: 'file_size', type: 'integer', isNullable: false },
          {
            name: 'owner_user_id',
            type: 'varchar',
            length: '255',
            isNullable: true,
          },
          { name: 'description', type: 'text', isNullable: true },
          {
            name: 'tags',
            type: 'text',
            isArray: true,
            default: "'{}'",
            isNullable: false,
          },
          {
            name: 'blob_name',
            type: 'varchar',
            length: '500',
            isNullable: true,
          },
          {
            name: 'blob_url',
            type: 'varchar',
            length: '1000',
            isNullable: true,
          },
          {
            name: 'container_name',
            type: 'varchar',
            length: '255',
            isNullable: true,
          },
          { name: 'extracted_text', type: 'text', isNullable: true },
          { name: 'page_count', type: 'integer', default: 0 },
          {
            name: 'ocr_processing_time_seconds',
            type: 'double precision',
            default: 0,
          },
          { name: 'text_extracted', type: 'boolean', default: false },
          {
            name: 'expediente',
            type: 'varchar',
            length: '100',
            isNullable: true,
          },
          {
            name: 'nombre_paciente',
            type: 'varchar',
            length: '255',
            isNullable: true,
          },
          {
            name: 'normalized_patient_name',
            type: 'varchar',
            length: '255',
            isNullable: true,
          },
          {
            name: 'numero_episodio',
            type: 'varchar',
            length: '100',
            isNullable: true,
          },
          {
            name: 'categoria',
            type: 'varchar',
            length: '20',
            isNullable: true,
          },
          { name: 'medical_info_valid', type: 'boolean', default: false },
          { name: 'medical_info_error', type: 'text', isNullable: true },
          {
            name: 'status',
            type: 'varchar',
            length: '50',
            isNullable: false,
          },
          { name: 'error_message', type: 'text', isNullable: true },
          { name: 'created_at', type: 'timestamp', default: 'now()' },
          { name: 'updated_at', type: 'timestamp', default: 'now()' },
        ],
      }),
      true,
    );

    const indexes: Array<[string, string]> = [
      ['IDX_documents_batch_id', 'batch_id'],
      ['IDX_documents_owner_user_id', 'owner_user_id'],
      ['IDX_documents_normalized_patient_name', 'normalized_patient_name'],
      ['IDX_documents_categoria', 'categoria'],
      ['IDX_documents_status', 'status'],
      ['IDX_documents_created_at', 'created_at'],
    ];
    for (const [name, column] of indexes) {
      await queryRunner.createIndex(
        'documents',
        new TableIndex({ name, columnNames: [column] }),
      );
    }

    // Prefix lookups on the search key
    await queryRunner.query(
      'CREATE INDEX "IDX_documents_normalized_patient_name_pattern" ON "documents" ("normalized_patient_name" varchar_pattern_ops)',
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('documents', true, true, true);
  }
}
