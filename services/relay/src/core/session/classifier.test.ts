import { describe, it, expect } from 'vitest'
import { ResponseClassifier } from './classifier.js'

describe('ResponseClassifier', () => {
    const classifier = new ResponseClassifier()

    it.each([
        ['AT+CWJAP="LAB","TEST-SECRET"', 45],
        ['AT+CWJAP?', 45],
        ['AT+CWLAP', 20],
        ['AT+CWLAPOPT=1,2047', 20],
        ['AT+GMR', 15],
        ['AT', 15],
    ])('timeoutFor(%s) = %i', (command, expected) => {
        expect(classifier.timeoutFor(command)).toBe(expected)
    })

    it.each(['OK', 'FAIL', 'ERROR', '  OK  ', 'ERROR\r'])('treats %j as a completion indicator', (line) => {
        expect(classifier.isCompletionIndicator(line)).toBe(true)
    })

    it.each(['ok', 'OK!', 'SEND OK', '+CWJAP:1', '', 'busy p...'])('does not treat %j as a completion indicator', (line) => {
        expect(classifier.isCompletionIndicator(line)).toBe(false)
    })

    it('accepts a custom rule table', () => {
        const custom = new ResponseClassifier({
            rules: [{ marker: 'CIPSTART', timeoutSec: 30, label: 'tcp-open' }],
            defaultTimeoutSec: 5,
            completionIndicators: ['OK', 'SEND OK'],
        })

        expect(custom.timeoutFor('AT+CIPSTART="TCP","10.0.0.1",80')).toBe(30)
        expect(custom.timeoutFor('AT+CWJAP?')).toBe(5)
        expect(custom.isCompletionIndicator('SEND OK')).toBe(true)
        expect(custom.isCompletionIndicator('FAIL')).toBe(false)
    })
})
