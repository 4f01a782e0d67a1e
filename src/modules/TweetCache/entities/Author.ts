import { Column, Entity, OneToMany, PrimaryColumn } from 'typeorm'
import { Post, type Post as PostType } from './Post'

@Entity('authors')
export class Author {
    @PrimaryColumn('text')
    username!: string

    @Column('integer')
    fetchedAt!: number

    @OneToMany(() => Post, post => post.author)
    posts!: PostType[]
}
