import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity('rooms')
export class Room {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 255, unique: true })
  name!: string;

  @Column({ type: 'int' })
  rows!: number;

  @Column({ name: 'seats_per_row', type: 'int' })
  seatsPerRow!: number;

  @Column({ default: true })
  active!: boolean;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
