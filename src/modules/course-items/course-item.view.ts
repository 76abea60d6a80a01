import type { CourseItemEntity } from './entities/course-item.entity';

export interface PlainCourseItemView {
  id: string;
  name: string;
  type: string;
  specialization_id: string;
}

export interface CourseItemView extends PlainCourseItemView {
  specialization: { id: string; name: string } | null;
}

export function toPlainCourseItemView(item: CourseItemEntity): PlainCourseItemView {
  return {
    id: item.id,
    name: item.name,
    type: item.type,
    specialization_id: item.specializationId,
  };
}

export function toCourseItemView(item: CourseItemEntity): CourseItemView {
  const { specialization } = item;
  return {
    ...toPlainCourseItemView(item),
    specialization: specialization ? { id: specialization.id, name: specialization.name } : null,
  };
}
