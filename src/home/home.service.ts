import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class HomeService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  appInfo() {
    return {
      name: this.configService.get('app.name', { infer: true }),
      version: this.configService.get('app.version', { infer: true }),
      description:
        'Medical document ingestion with OCR and fuzzy patient-name search',
    };
  }
}
