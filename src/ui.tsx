import {observer} from 'mobx-react-lite';
import {render, Text} from 'ink';
import { ProgressState } from './progress';

// Simple react-based live readout of analysis progress

export function createUi() {
    const state = new ProgressState();
    let instance: ReturnType<typeof render> | undefined;

    function start() {
        instance = render(<Progress state={state}/>);
    }
    function stop() {
        instance?.unmount();
        instance = undefined;
    }
    return {state, start, stop};
}

interface ProgressProps { state: ProgressState; }
const Progress = observer((props: ProgressProps) => {
    const {state} = props;
    return <>
        {state.logLines.map((line, i) => <Text key={i} color="green">{line}</Text>)}
        <Text color="blue">{state.currentAction}</Text>
        <Text>Code units harvested: {state.unitsHarvested} ({state.identifiersHarvested} identifiers)</Text>
        <Text>Useful types: {state.usefulTypes} (checked {state.processedTypes}, {state.pendingTypes} more to do)</Text>
        <Text>Rejections: {state.rejections}</Text>
    </>;
});
