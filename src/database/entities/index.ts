import { CourseEntity } from './course.entity';
import { StudentEntity } from './student.entity';
import { StudyGroupMemberEntity } from './study-group-member.entity';
import { StudyGroupEntity } from './study-group.entity';
import { TimeSlotEntity } from './timeslot.entity';

export {
  CourseEntity,
  StudentEntity,
  StudyGroupEntity,
  StudyGroupMemberEntity,
  TimeSlotEntity,
};

export const ENTITIES = [
  CourseEntity,
  TimeSlotEntity,
  StudentEntity,
  StudyGroupEntity,
  StudyGroupMemberEntity,
];
