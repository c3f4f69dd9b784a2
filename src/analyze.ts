import fs from 'fs';
import { createTypeCatalog } from './catalog';
import { readCatalogFile } from './catalog-file';
import { ClosureResult, computeClosure } from './closure';
import { LoadedConfig } from './config';
import { harvestIdentifiers, HarvestResult } from './harvest';
import { createLogger, getLoggableFilename, Logger, LogSink } from './logging';
import { DEFAULT_OVERRIDES, EMPTY_OVERRIDES, mergeOverrides, OverridePolicy } from './policy';
import { findRejections, MemberStatus, RejectionRecord, RejectionSummary, summarizeRejections, TypeStatus } from './rejections';
import { formatJson, formatTypesystem } from './typesystem';

export interface TrimResult {
    harvest: HarvestResult;
    closure: ClosureResult;
    rejections: RejectionRecord[];
    summary: RejectionSummary;
    /** Serialized rejections, as written to the output file or stdout */
    document: string;
}

export interface TrimOptions {
    /** Replaces the console as the log destination (the progress view does this too) */
    sink?: LogSink;
    /** Where the document goes when the config names no output file */
    stdout?: (text: string) => void;
}

export function createPolicy(config: LoadedConfig) {
    const base = config.replaceDefaultOverrides ? EMPTY_OVERRIDES : DEFAULT_OVERRIDES;
    return new OverridePolicy(mergeOverrides(base, {
        keepTypes: config.keepTypes,
        keepMembers: config.keepMembers,
    }));
}

/**
 * Harvest the application, close over the catalog, and emit rejections.
 * Every run starts from scratch: nothing is cached between runs.
 */
export async function runTrim(config: LoadedConfig, options: TrimOptions = {}): Promise<TrimResult> {
    // ink is only loaded when the live view is wanted
    const ui = config.progress ? (await import('./ui')).createUi() : undefined;
    const log: Logger = createLogger({
        level: config.logLevel,
        sink: options.sink ?? (ui ? line => ui.state.log(line) : undefined),
    });
    ui?.start();
    let result: TrimResult;
    try {
        if(ui) ui.state.currentAction = 'Harvesting identifiers...';
        const harvest = await harvestIdentifiers(config.appRootAbs, {
            include: config.include,
            ignore: config.ignore,
            log,
            onUnit(_label, identifierCount) {
                if(!ui) return;
                ui.state.unitsHarvested++;
                ui.state.identifiersHarvested = identifierCount;
            },
        });
        log.info(`Harvested ${harvest.identifiers.size} identifiers from ${harvest.unitCount} code units (${harvest.skipped.length} skipped)`);

        if(ui) ui.state.currentAction = 'Computing reachable types...';
        const catalog = createTypeCatalog(readCatalogFile(config.catalogAbs), {
            placeholders: config.placeholders,
            listSuffixes: config.listSuffixes,
            log,
        });
        const policy = createPolicy(config);
        const closure = await computeClosure({
            catalog,
            policy,
            identifiers: harvest.identifiers,
            log,
            observer: {
                typeAdded() {
                    if(ui) ui.state.usefulTypes++;
                },
                typeProcessed(_type, pending) {
                    if(!ui) return;
                    ui.state.processedTypes++;
                    ui.state.pendingTypes = pending;
                },
            },
        });
        log.info(`${closure.useful.size} useful types`);

        if(ui) ui.state.currentAction = 'Emitting rejections...';
        const input = { catalog, policy, identifiers: harvest.identifiers, closure };
        const rejections = await findRejections(input);
        const summary = await summarizeRejections(input);
        if(ui) ui.state.rejections = rejections.length;
        for(const record of rejections) {
            log.debug(record.kind === 'type' ? `REJECT ${record.type}` : `REJECT ${record.type}.${record.member}`);
        }
        log.info(`rejecting ${summary.types[TypeStatus.Rejected]} types, ${summary.members[MemberStatus.Rejected]} members`);

        const document = config.format === 'json'
            ? formatJson(rejections)
            : formatTypesystem(rejections, config.packageName);
        result = { harvest, closure, rejections, summary, document };
    } finally {
        ui?.stop();
    }

    if(config.outputAbs) {
        fs.writeFileSync(config.outputAbs, result.document);
        log.info(`Wrote ${getLoggableFilename(config.outputAbs)}`);
    } else {
        (options.stdout ?? (text => process.stdout.write(text)))(result.document);
    }
    return result;
}
