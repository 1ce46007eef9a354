import { Module } from '@nestjs/common';
import { HomeService } from './home.service';
import { HomeController } from './home.controller';
import { HealthService } from './health.service';
import { ConfigModule } from '@nestjs/config';
import { DocumentProcessingModule } from '../document-processing/document-processing.module';

@Module({
  imports: [
    ConfigModule,
    // Provides 'StorageServicePort'
    DocumentProcessingModule,
  ],
  controllers: [HomeController],
  providers: [HomeService, HealthService],
})
export class HomeModule {}
