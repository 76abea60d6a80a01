import { PlainCourseItemView, toPlainCourseItemView } from '../course-items/course-item.view';
import type { SpecializationEntity } from './entities/specialization.entity';

export interface SpecializationView {
  id: string;
  name: string;
  course_items: PlainCourseItemView[];
}

export function toSpecializationView(specialization: SpecializationEntity): SpecializationView {
  return {
    id: specialization.id,
    name: specialization.name,
    course_items: (specialization.courseItems ?? []).map(toPlainCourseItemView),
  };
}
