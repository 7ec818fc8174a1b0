import { Module } from '@nestjs/common';
import { ConnectivityModule } from '../connectivity/connectivity.module';
import { OllamaModule } from '../ollama/ollama.module';
import { DecisionService } from './decision.service';

@Module({
  imports: [OllamaModule, ConnectivityModule],
  providers: [DecisionService],
  exports: [DecisionService],
})
export class DecisionModule {}
