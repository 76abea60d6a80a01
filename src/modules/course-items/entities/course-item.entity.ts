import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryColumn, Unique } from 'typeorm';
import type { Relation } from 'typeorm';
import { SpecializationEntity } from '../../specializations/entities/specialization.entity';

@Entity({ name: 'course_items' })
@Unique(['name', 'specializationId'])
export class CourseItemEntity {
  @PrimaryColumn({ type: 'varchar', length: 32 })
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 50 })
  type!: string;

  @Index()
  @Column({ name: 'specialization_id', type: 'varchar', length: 32 })
  specializationId!: string;

  @ManyToOne(() => SpecializationEntity, (specialization) => specialization.courseItems, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'specialization_id' })
  specialization?: Relation<SpecializationEntity>;
}
