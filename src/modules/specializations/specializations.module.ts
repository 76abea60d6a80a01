import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CourseItemEntity } from '../course-items/entities/course-item.entity';
import { SpecializationEntity } from './entities/specialization.entity';
import { SpecializationsController } from './specializations.controller';
import { SpecializationsService } from './specializations.service';

@Module({
  imports: [TypeOrmModule.forFeature([SpecializationEntity, CourseItemEntity])],
  controllers: [SpecializationsController],
  providers: [SpecializationsService],
})
export class SpecializationsModule {}
