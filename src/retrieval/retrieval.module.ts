import { Module } from '@nestjs/common';
import { RetrievalController } from './retrieval.controller';
import { WorkflowModule } from './workflow/workflow.module';

@Module({
  imports: [WorkflowModule],
  controllers: [RetrievalController],
})
export class RetrievalModule {}
