/**
 * Clinic-area codes accepted as the last filename segment
 */
export enum MedicalCategory {
  EMER = 'EMER',
  CONS = 'CONS',
  LAB = 'LAB',
  RAD = 'RAD',
  CIRC = 'CIRC',
  HOSP = 'HOSP',
  UCI = 'UCI',
  URG = 'URG',
}

export const MEDICAL_CATEGORY_LABELS: Record<MedicalCategory, string> = {
  [MedicalCategory.EMER]: 'Emergencia',
  [MedicalCategory.CONS]: 'Consulta',
  [MedicalCategory.LAB]: 'Laboratorio',
  [MedicalCategory.RAD]: 'Radiología',
  [MedicalCategory.CIRC]: 'Cirugía',
  [MedicalCategory.HOSP]: 'Hospitalización',
  [MedicalCategory.UCI]: 'Unidad de Cuidados Intensivos',
  [MedicalCategory.URG]: 'Urgencias',
};

export function isMedicalCategory(value: string): value is MedicalCategory {
  return Object.values<string>(MedicalCategory).includes(value);
}
