import { Module } from '@nestjs/common';

// Controllers and Services
import { LottoController } from './lotto/lotto.controller';
import { LottoService } from './lotto/lotto.service';
import { LottoModule } from '../lotto/lotto.module';

@Module({
  imports: [LottoModule],
  controllers: [LottoController],
  providers: [LottoService],
})
export class ApiModule {}
