import { describe, it, expect } from 'vitest'
import axios, { type InternalAxiosRequestConfig } from 'axios'
import { TimelineClient } from './TimelineClient'
import { InvalidConfigurationError, TimelineApiError } from '../../types/types'

type Reply = { status: number; data: unknown } | Error

function fakeHttp(replies: Reply[]) {
    const requests: InternalAxiosRequestConfig[] = []
    const http = axios.create({
        adapter: async config => {
            requests.push(config)
            const reply = replies.shift() ?? { status: 200, data: [] }
            if (reply instanceof Error) throw reply
            return { data: reply.data, status: reply.status, statusText: String(reply.status), headers: {}, config }
        }
    })
    return { http, requests }
}

// Newest first, like the API
function statuses(fromId: number, count: number) {
    return Array.from({ length: count }, (_, i) => ({ id_str: String(fromId - i), full_text: `post ${fromId - i}` }))
}

function clientFor(replies: Reply[]) {
    const { http, requests } = fakeHttp(replies)
    const client = new TimelineClient({ bearerToken: 'test-token', baseURL: 'https://api.example.test/1.1', http })
    return { client, requests }
}

describe('TimelineClient.fetchTexts', () => {
    it('requests the user timeline with replies and reposts left out', async () => {
        const { client, requests } = clientFor([{ status: 200, data: statuses(10, 2) }])

        expect(await client.fetchTexts('someone', 2)).toEqual(['post 10', 'post 9'])

        expect(requests).toHaveLength(1)
        expect(requests[0].baseURL).toBe('https://api.example.test/1.1')
        expect(requests[0].url).toBe('statuses/user_timeline.json')
        expect(requests[0].params).toEqual({
            screen_name: 'someone',
            count: '2',
            exclude_replies: 'true',
            include_rts: 'false',
            tweet_mode: 'extended'
        })
        expect(requests[0].headers.get('Authorization')).toBe('Bearer test-token')
    })

    it('pages backwards with max_id until the amount is reached', async () => {
        const { client, requests } = clientFor([
            { status: 200, data: statuses(1000, 200) },
            { status: 200, data: statuses(800, 50) }
        ])

        const texts = await client.fetchTexts('someone', 250)

        expect(texts).toHaveLength(250)
        expect(texts[0]).toBe('post 1000')
        expect(texts[249]).toBe('post 751')
        expect(requests).toHaveLength(2)
        expect(requests[0].params).not.toHaveProperty('max_id')
        expect(requests[1].params).toMatchObject({ count: '50', max_id: '800' })
    })

    it('keeps 64-bit ids exact when paging', async () => {
        const { client, requests } = clientFor([
            { status: 200, data: [{ id_str: '1234567890123456789', full_text: 'big id' }] },
            { status: 200, data: [] }
        ])

        expect(await client.fetchTexts('someone', 5)).toEqual(['big id'])
        expect(requests[1].params).toMatchObject({ max_id: '1234567890123456788', count: '4' })
    })

    it('stops early when the timeline runs out', async () => {
        const { client, requests } = clientFor([
            { status: 200, data: statuses(30, 3) },
            { status: 200, data: [] }
        ])

        expect(await client.fetchTexts('someone', 300)).toEqual(['post 30', 'post 29', 'post 28'])
        expect(requests).toHaveLength(2)
        expect(requests[1].params).toMatchObject({ count: '200', max_id: '27' })
    })

    it('falls back to text when full_text is missing', async () => {
        const { client } = clientFor([{ status: 200, data: [{ id_str: '5', text: 'short form' }] }, { status: 200, data: [] }])
        expect(await client.fetchTexts('someone', 2)).toEqual(['short form'])
    })

    it('rejects a user with no posts', async () => {
        const { client } = clientFor([{ status: 200, data: [] }])
        await expect(client.fetchTexts('someone', 10)).rejects.toThrow(new TimelineApiError('User has no tweets.'))
    })

    it('reports the API error message and status', async () => {
        const { client } = clientFor([{ status: 401, data: { errors: [{ message: 'Invalid or expired token', code: 89 }] } }])
        await expect(client.fetchTexts('someone', 10)).rejects.toMatchObject({
            name: 'TimelineApiError',
            message: 'Invalid or expired token',
            status: 401
        })
    })

    it('falls back to the status code when the error body is unreadable', async () => {
        const { client } = clientFor([{ status: 503, data: '<html>unavailable</html>' }])
        await expect(client.fetchTexts('someone', 10)).rejects.toMatchObject({ message: 'HTTP 503', status: 503 })
    })

    it('treats an error body sent with 200 as an error', async () => {
        const { client } = clientFor([{ status: 200, data: { error: 'Not authorized.' } }])
        await expect(client.fetchTexts('someone', 10)).rejects.toMatchObject({ message: 'Not authorized.', status: 200 })
    })

    it('rejects a payload that is not a timeline', async () => {
        const { client } = clientFor([{ status: 200, data: [{ id: 5 }] }])
        await expect(client.fetchTexts('someone', 10)).rejects.toThrow(/^Unexpected timeline payload/)
    })

    it('wraps transport failures', async () => {
        const { client } = clientFor([new Error('socket hang up')])
        await expect(client.fetchTexts('someone', 10)).rejects.toThrow(new TimelineApiError('Timeline request failed: socket hang up'))
    })

    it('rejects a non-positive amount without a request', async () => {
        const { client, requests } = clientFor([])
        await expect(client.fetchTexts('someone', 0)).rejects.toThrow(InvalidConfigurationError)
        expect(requests).toHaveLength(0)
    })
})
