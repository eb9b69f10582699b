import { Module } from '@nestjs/common';
import { TransferController } from './transfer.controller';
import { TableReaderService } from './table-reader.service';
import { TableWriterService } from './table-writer.service';
import { LayoutModule } from '../layout/layout.module';

@Module({
  imports: [LayoutModule],
  controllers: [TransferController],
  providers: [TableReaderService, TableWriterService],
})
export class TransferModule {}
