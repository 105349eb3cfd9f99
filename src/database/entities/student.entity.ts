import {
  Column,
  CreateDateColumn,
  Entity,
  JoinTable,
  ManyToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { CourseEntity } from './course.entity';
import { TimeSlotEntity } from './timeslot.entity';

@Entity('students')
export class StudentEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  name!: string;

  @Column({ type: 'text', unique: true })
  email!: string;

  @Column({ name: 'preferred_group_size', type: 'integer', default: 3 })
  preferredGroupSize!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @ManyToMany(() => CourseEntity, { onDelete: 'CASCADE' })
  @JoinTable({
    name: 'student_courses',
    joinColumn: { name: 'student_id', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'course_id', referencedColumnName: 'id' },
  })
  courses!: CourseEntity[];

  @ManyToMany(() => TimeSlotEntity, { onDelete: 'CASCADE' })
  @JoinTable({
    name: 'student_availability',
    joinColumn: { name: 'student_id', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'timeslot_id', referencedColumnName: 'id' },
  })
  availability!: TimeSlotEntity[];
}
