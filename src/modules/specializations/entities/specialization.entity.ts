import { Column, Entity, OneToMany, PrimaryColumn, Unique } from 'typeorm';
import type { Relation } from 'typeorm';
import { CourseItemEntity } from '../../course-items/entities/course-item.entity';

@Entity({ name: 'specializations' })
@Unique(['name'])
export class SpecializationEntity {
  @PrimaryColumn({ type: 'varchar', length: 32 })
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @OneToMany(() => CourseItemEntity, (item) => item.specialization)
  courseItems?: Relation<CourseItemEntity>[];
}
