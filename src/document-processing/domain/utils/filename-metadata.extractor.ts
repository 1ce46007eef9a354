import { isMedicalCategory } from '../enums/medical-category.enum';

export type FilenameMetadata =
  | {
      valid: true;
      expediente: string;
      nombrePaciente: string;
      numeroEpisodio: string;
      categoria: string;
    }
  | { valid: false; error: string };

const EXPECTED_SEGMENTS = 4;
const SEGMENT_LABELS = [
  'expediente',
  'nombre_paciente',
  'numero_episodio',
  'categoria',
] as const;

// Width of the expediente and numero_episodio columns
const MAX_IDENTIFIER_LENGTH = 100;

/**
 * Parse `<expediente>_<nombre_paciente>_<numero_episodio>_<categoria>.<ext>`.
 *
 * Fields are returned verbatim; only the extension is stripped. The patient
 * name may contain spaces and commas but not underscores.
 */
export function extractFilenameMetadata(fileName: string): FilenameMetadata {
  const baseName = stripExtension(fileName);
  const parts = baseName.split('_');

  if (parts.length < EXPECTED_SEGMENTS) {
    return {
      valid: false,
      error: `Filename has missing components: expected ${EXPECTED_SEGMENTS} segments separated by '_', found ${parts.length}`,
    };
  }
  if (parts.length > EXPECTED_SEGMENTS) {
    return {
      valid: false,
      error: `Filename has too many components: expected ${EXPECTED_SEGMENTS} segments separated by '_', found ${parts.length}`,
    };
  }

  const emptyIndex = parts.findIndex((part) => part.trim().length === 0);
  if (emptyIndex !== -1) {
    return {
      valid: false,
      error: `Filename component '${SEGMENT_LABELS[emptyIndex]}' is empty`,
    };
  }

  const tooLongIndex = [0, 2].find(
    (index) => parts[index].length > MAX_IDENTIFIER_LENGTH,
  );
  if (tooLongIndex !== undefined) {
    return {
      valid: false,
      error: `Filename component '${SEGMENT_LABELS[tooLongIndex]}' exceeds ${MAX_IDENTIFIER_LENGTH} characters`,
    };
  }

  const [expediente, nombrePaciente, numeroEpisodio, categoria] = parts;
  if (!isMedicalCategory(categoria)) {
    return {
      valid: false,
      error: `Unknown category '${categoria}'`,
    };
  }

  return {
    valid: true,
    expediente,
    nombrePaciente,
    numeroEpisodio,
    categoria,
  };
}

function stripExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot > 0 ? fileName.slice(0, dot) : fileName;
}
