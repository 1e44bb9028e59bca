import { expect } from 'chai';
import { createTimer } from '../src/utils/profiling';

describe('createTimer', () => {
    it('should track a running timer until it is stopped', () => {
        const timer = createTimer();
        timer.start('insert');
        expect(timer.isRunning('insert')).to.be.true;
        expect(timer.getActiveTimers()).to.deep.equal(['insert']);

        const result = timer.stop('insert');
        expect(result.total).to.be.at.least(0);
        expect(result.splits).to.have.lengthOf(1);
        expect(result.splits[0].label).to.be.null;
        expect(timer.isRunning('insert')).to.be.false;
        expect(timer.getActiveTimers()).to.deep.equal([]);
    });

    it('should record labelled splits', () => {
        const timer = createTimer();
        timer.start('search');
        timer.split('search', 'bottom');
        timer.split('search', 'top');

        const result = timer.stop('search');
        expect(result.splits.map((split) => split.label)).to.deep.equal(['bottom', 'top']);
    });

    it('should keep the last duration after stop', () => {
        const timer = createTimer();
        expect(timer.getDuration('search')).to.be.undefined;

        timer.start('search');
        const { total } = timer.stop('search');
        expect(timer.getDuration('search')).to.equal(total);

        timer.start('search');
        expect(timer.getDuration('search')).to.equal(total);
    });

    it('should throw when stopping a timer that was never started', () => {
        const timer = createTimer();
        expect(() => timer.stop('missing')).to.throw('Timer missing not started');
        expect(() => timer.split('missing')).to.throw('Timer missing not started');
        expect(timer.getElapsed('missing')).to.equal(0);
    });
});
