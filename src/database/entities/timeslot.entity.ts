import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

@Entity('timeslots')
export class TimeSlotEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text', unique: true })
  label!: string;

  @Column({ name: 'day_of_week', type: 'text' })
  dayOfWeek!: string;

  @Column({ name: 'start_time', type: 'text' })
  startTime!: string;

  @Column({ name: 'end_time', type: 'text' })
  endTime!: string;
}
