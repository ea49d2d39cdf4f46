import { describe, it, expect } from 'vitest';
import { parseChatInput } from './chat-session.js';

describe('parseChatInput', () => {
    it('should ignore blank lines', () => {
        expect(parseChatInput('   ')).toEqual({ action: 'continue' });
    });

    it('should leave on quit or exit, with or without a slash', () => {
        expect(parseChatInput('quit').action).toBe('exit');
        expect(parseChatInput(' EXIT ').action).toBe('exit');
        expect(parseChatInput('/exit').action).toBe('exit');
        expect(parseChatInput('/q').action).toBe('exit');
    });

    it('should treat other text as a question', () => {
        expect(parseChatInput('How do I exit vim?')).toEqual({ action: 'ask' });
    });

    it('should pick out slash commands', () => {
        expect(parseChatInput('/Tools now')).toEqual({ action: 'continue', command: 'tools' });
    });
});
