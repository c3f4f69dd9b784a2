import { configure, makeAutoObservable } from 'mobx';

configure({
    enforceActions: 'never',
});

/** Live counters for one analysis run, observed by the terminal view. */
export class ProgressState {
    constructor() {
        makeAutoObservable(this);
    }
    maxLogLength = 5;
    currentAction = '';
    unitsHarvested = 0;
    identifiersHarvested = 0;
    usefulTypes = 0;
    processedTypes = 0;
    pendingTypes = 0;
    rejections = 0;
    logLines: string[] = [];
    log(line: string) {
        this.logLines.push(line);
        if(this.logLines.length > this.maxLogLength) {
            this.logLines.shift();
        }
    }
}
