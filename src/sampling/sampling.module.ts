import { Module } from '@nestjs/common';
import { SourceSamplerService } from './source-sampler.service';

@Module({
  providers: [SourceSamplerService],
  exports: [SourceSamplerService],
})
export class SamplingModule {}
