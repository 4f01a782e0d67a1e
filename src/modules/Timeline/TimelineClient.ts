import { Logger, red, yellow } from '../../util/logger'
const logger = new Logger('Timeline | Client')

import axios, { type AxiosInstance, type AxiosResponse } from 'axios'
import { z } from 'zod'

import { InvalidConfigurationError, TimelineApiError } from '../../types/types'

const statusSchema = z.object({
    id_str: z.string().regex(/^\d+$/),
    full_text: z.string().optional(),
    text: z.string().optional()
}).refine(status => status.full_text !== undefined || status.text !== undefined, 'status has no text')
type Status = z.infer<typeof statusSchema>

const timelineSchema = z.array(statusSchema)

const errorBodySchema = z.union([
    z.object({ errors: z.array(z.object({ message: z.string(), code: z.number().optional() })).min(1) }),
    z.object({ error: z.string() })
])
type ErrorBody = z.infer<typeof errorBodySchema>

const describeErrorBody = (body: ErrorBody) => 'errors' in body ? body.errors.map(e => e.message).join('; ') : body.error

export interface TimelineClientOptions {
    bearerToken: string
    baseURL?: string
    http?: AxiosInstance
}

export const DEFAULT_API_BASE_URL = 'https://api.twitter.com/1.1'

/**
 * Reads a user's own posts, newest first. Replies and reposts are left out by the API,
 * so a page can hold fewer posts than requested and the total can fall short of `amount`.
 */
export class TimelineClient {
    static readonly PAGE_SIZE = 200

    private readonly http: AxiosInstance
    private readonly baseURL: string
    private readonly bearerToken: string

    constructor(options: TimelineClientOptions) {
        this.http = options.http ?? axios.create({ timeout: 15_000 })
        this.baseURL = options.baseURL ?? DEFAULT_API_BASE_URL
        this.bearerToken = options.bearerToken
    }

    public async fetchTexts(username: string, amount: number): Promise<string[]> {
        if (!Number.isInteger(amount) || amount < 1) {
            throw new InvalidConfigurationError([`amount must be a positive integer (got ${amount})`])
        }

        const texts: string[] = []
        let maxId: bigint | null = null
        let page = 1

        while (texts.length < amount) {
            const count = Math.min(amount - texts.length, TimelineClient.PAGE_SIZE)
            const statuses = await this.fetchPage(username, count, maxId)
            logger.debug(`{fetchTexts} Page ${yellow(page)} for ${yellow(username)}: ${yellow(statuses.length)} posts`)

            if (statuses.length === 0) {
                if (maxId === null) throw new TimelineApiError('User has no tweets.')
                break
            }

            for (const status of statuses) {
                texts.push(status.full_text ?? status.text ?? '')
            }
            maxId = BigInt(statuses[statuses.length - 1].id_str) - 1n
            page++
        }

        return texts.slice(0, amount)
    }

    private async fetchPage(username: string, count: number, maxId: bigint | null): Promise<Status[]> {
        const params: Record<string, string> = {
            screen_name: username,
            count: String(count),
            exclude_replies: 'true',
            include_rts: 'false',
            tweet_mode: 'extended'
        }
        if (maxId !== null) params.max_id = maxId.toString()

        let response: AxiosResponse<unknown>
        try {
            response = await this.http.get<unknown>('statuses/user_timeline.json', {
                baseURL: this.baseURL,
                params,
                headers: { Authorization: `Bearer ${this.bearerToken}` },
                validateStatus: () => true
            })
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error)
            logger.warn(`{fetchPage} Request failed: ${red(message)}`)
            throw new TimelineApiError(`Timeline request failed: ${message}`)
        }

        if (response.status < 200 || response.status >= 300) {
            const body = errorBodySchema.safeParse(response.data)
            throw new TimelineApiError(body.success ? describeErrorBody(body.data) : `HTTP ${response.status}`, response.status)
        }

        // Some failures still come back as 200 with an error body
        const body = errorBodySchema.safeParse(response.data)
        if (body.success) throw new TimelineApiError(describeErrorBody(body.data), response.status)

        const timeline = timelineSchema.safeParse(response.data)
        if (!timeline.success) {
            throw new TimelineApiError(`Unexpected timeline payload: ${timeline.error.issues[0]?.message ?? 'unknown shape'}`, response.status)
        }
        return timeline.data
    }
}
