import { Entity, JoinColumn, ManyToOne, PrimaryColumn } from 'typeorm';
import { StudentEntity } from './student.entity';
import { StudyGroupEntity } from './study-group.entity';

@Entity('study_group_members')
export class StudyGroupMemberEntity {
  @PrimaryColumn({ name: 'group_id', type: 'integer' })
  groupId!: number;

  @PrimaryColumn({ name: 'student_id', type: 'integer' })
  studentId!: number;

  @ManyToOne(() => StudyGroupEntity, (group) => group.members, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'group_id' })
  group!: StudyGroupEntity;

  @ManyToOne(() => StudentEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'student_id' })
  student!: StudentEntity;
}
