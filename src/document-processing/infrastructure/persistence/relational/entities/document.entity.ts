import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { ProcessingStatus } from '../../../../domain/enums/processing-status.enum';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';

@Entity({ name: 'documents' })
export class DocumentEntity extends EntityRelationalHelper {
  // Assigned by the ingestion pipeline, never generated here
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ name: 'processing_id', type: 'uuid' })
  processingId!: string;

  @Column({ name: 'batch_id', type: 'uuid', nullable: true })
  @Index('IDX_documents_batch_id')
  batchId!: string | null;

  @Column({ name: 'batch_index', type: 'integer', nullable: true })
  batchIndex!: number | null;

  @Column({ name: 'file_name', type: 'varchar', length: 255 })
  fileName!: string;

  @Column({ name: 'content_type', type: 'varchar', length: 100 })
  contentType!: string;

  @Column({ name: 'file_size', type: 'integer' })
  fileSize!: number;

  @Column({
    name: 'owner_user_id',
    type: 'varchar',
    length: 255,
    nullable: true,
  })
  @Index('IDX_documents_owner_user_id')
  ownerUserId!: string | null;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'text', array: true, default: () => "'{}'" })
  tags!: string[];

  // Storage linkage: all three set together or all null
  @Column({ name: 'blob_name', type: 'varchar', length: 500, nullable: true })
  blobName!: string | null;

  @Column({ name: 'blob_url', type: 'varchar', length: 1000, nullable: true })
  blobUrl!: string | null;

  @Column({
    name: 'container_name',
    type: 'varchar',
    length: 255,
    nullable: true,
  })
  containerName!: string | null;

  // PHI - encrypted at rest by PostgreSQL
  @Column({ name: 'extracted_text', type: 'text', nullable: true })
  extractedText!: string | null;

  @Column({ name: 'page_count', type: 'integer', default: 0 })
  pageCount!: number;

  @Column({
    name: 'ocr_processing_time_seconds',
    type: 'double precision',
    default: 0,
  })
  ocrProcessingTimeSeconds!: number;

  @Column({ name: 'text_extracted', type: 'boolean', default: false })
  textExtracted!: boolean;

  // Medical metadata parsed from the filename (PHI)
  @Column({ type: 'varchar', length: 100, nullable: true })
  expediente!: string | null;

  @Column({
    name: 'nombre_paciente',
    type: 'varchar',
    length: 255,
    nullable: true,
  })
  nombrePaciente!: string | null;

  @Column({
    name: 'normalized_patient_name',
    type: 'varchar',
    length: 255,
    nullable: true,
  })
  @Index('IDX_documents_normalized_patient_name')
  normalizedPatientName!: string | null;

  @Column({
    name: 'numero_episodio',
    type: 'varchar',
    length: 100,
    nullable: true,
  })
  numeroEpisodio!: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  @Index('IDX_documents_categoria')
  categoria!: string | null;

  @Column({ name: 'medical_info_valid', type: 'boolean', default: false })
  medicalInfoValid!: boolean;

  @Column({ name: 'medical_info_error', type: 'text', nullable: true })
  medicalInfoError!: string | null;

  @Column({ type: 'varchar', length: 50 })
  @Index('IDX_documents_status')
  status!: ProcessingStatus;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  @Index('IDX_documents_created_at')
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
