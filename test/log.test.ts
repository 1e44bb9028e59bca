import { expect } from 'chai';
import sinon from 'sinon';
import { LevelIndex } from '../src';
import { getLogLevel, log, setLogLevel } from '../src/utils/log';
import { LogLevel } from '../src/types';

describe('log', () => {
    let previousLevel: LogLevel;

    beforeEach(() => {
        previousLevel = getLogLevel();
    });

    afterEach(() => {
        setLogLevel(previousLevel);
        sinon.restore();
    });

    it('should write coloured lines through console', () => {
        const warn = sinon.stub(console, 'warn');
        setLogLevel('debug');

        log('warn', 'replacing vector', { id: 'a' });

        expect(warn.calledOnceWithExactly('%creplacing vector', 'color: #ffc107', { id: 'a' })).to.be.true;
    });

    it('should drop messages below the minimum level', () => {
        const info = sinon.stub(console, 'info');
        const error = sinon.stub(console, 'error');
        setLogLevel('warn');

        log('info', 'hidden');
        log('error', 'shown');

        expect(info.called).to.be.false;
        expect(error.calledOnce).to.be.true;
    });

    it('should let the engine warn about replaced IDs', () => {
        const warn = sinon.stub(console, 'warn');
        setLogLevel('warn');

        const index = new LevelIndex(5, 1);
        index.addVector('a', { id: 'a', vector: [0] });
        index.addVector('a', { id: 'a', vector: [1] });

        expect(warn.calledOnceWithExactly('%c[LevelIndex] Vector with id a already exists, replacing it', 'color: #ffc107')).to.be.true;
    });
});
