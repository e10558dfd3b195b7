import { Module } from '@nestjs/common';
import { LoggingModule } from '../../logging/logging.module';
import { S3Service } from './s3.service';

@Module({
  imports: [LoggingModule],
  providers: [S3Service],
  exports: [S3Service],
})
export class S3Module {}
