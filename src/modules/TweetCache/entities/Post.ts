import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm'
import { Author, type Author as AuthorType } from './Author'

@Entity('posts')
@Index(['authorUsername', 'position'])
export class Post {
    @PrimaryGeneratedColumn('increment')
    id!: number

    @Column('text')
    text!: string

    // Timeline order, newest first
    @Column('integer')
    position!: number

    @Column('text')
    authorUsername!: string

    @ManyToOne(() => Author, author => author.posts, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'authorUsername' })
    author!: AuthorType
}
