import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { StorageHealthIndicator } from './indicators/storage.health';
import { SummarizerHealthIndicator } from './indicators/summarizer.health';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

@Module({
  imports: [TerminusModule, InfrastructureModule],
  controllers: [HealthController],
  providers: [StorageHealthIndicator, SummarizerHealthIndicator],
})
export class HealthModule {}
