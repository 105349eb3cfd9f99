import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { CourseEntity } from './course.entity';
import { StudyGroupMemberEntity } from './study-group-member.entity';

@Entity('study_groups')
export class StudyGroupEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('idx_study_groups_course')
  @Column({ name: 'course_id', type: 'integer' })
  courseId!: number;

  @ManyToOne(() => CourseEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'course_id' })
  course!: CourseEntity;

  /** 1-based position among the course's groups */
  @Column({ name: 'group_index', type: 'integer' })
  groupIndex!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @OneToMany(() => StudyGroupMemberEntity, (member) => member.group)
  members!: StudyGroupMemberEntity[];
}
