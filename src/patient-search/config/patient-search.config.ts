import { registerAs } from '@nestjs/config';
import { IsInt, IsNumber, IsOptional, Max, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { PatientSearchConfig } from './patient-search-config.type';

class EnvironmentVariablesValidator {
  @IsNumber()
  @Min(0)
  @Max(1)
  @IsOptional()
  PATIENT_SEARCH_FUZZY_THRESHOLD?: number;

  @IsInt()
  @Min(1)
  @Max(10000)
  @IsOptional()
  PATIENT_SEARCH_CANDIDATE_CAP?: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  @IsOptional()
  PATIENT_SEARCH_DEFAULT_MIN_SIMILARITY?: number;
}

export default registerAs<PatientSearchConfig>('patientSearch', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    fuzzyThreshold: process.env.PATIENT_SEARCH_FUZZY_THRESHOLD
      ? parseFloat(process.env.PATIENT_SEARCH_FUZZY_THRESHOLD)
      : 0.5,
    candidateCap: process.env.PATIENT_SEARCH_CANDIDATE_CAP
      ? parseInt(process.env.PATIENT_SEARCH_CANDIDATE_CAP, 10)
      : 500,
    defaultMinSimilarity: process.env.PATIENT_SEARCH_DEFAULT_MIN_SIMILARITY
      ? parseFloat(process.env.PATIENT_SEARCH_DEFAULT_MIN_SIMILARITY)
      : 0.3,
  };
});
