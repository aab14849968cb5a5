#!/usr/bin/env node
import * as fs from "fs";
import {
    getSliceCount,
    headerToObject,
    parseCsaHeader,
    parseProtocolDetailed,
    readCsaFromDicom,
    decodeLatin1,
    type CsaHeaderKind,
    type NumericEncoding,
    type ParsedHeader,
    type ProtocolBlock,
} from "./index";
import { formatHeaderLines } from "./utils/format";

async function run(args: string[] = process.argv.slice(2)): Promise<void> {
    const command = args[0];
    const positional = args.slice(1).filter((arg) => !arg.startsWith("--"));
    const flags = new Set(args.slice(1).filter((arg) => arg.startsWith("--")));

    if (!command) {
        printHelp();
        process.exit(1);
    }

    switch (command) {
        case "dump":
            if (!positional[0]) {
                console.error("Usage: csa-header dump <dicom-file> [--series] [--json]");
                process.exit(1);
            }
            dumpDicom(positional[0], flags.has("--series") ? "series" : "image", flags.has("--json"));
            break;

        case "raw":
            if (!positional[0]) {
                console.error("Usage: csa-header raw <csa-file> [--binary-numbers] [--json]");
                process.exit(1);
            }
            dumpRaw(positional[0], flags.has("--binary-numbers") ? "binary" : "text", flags.has("--json"));
            break;

        case "protocol":
            if (!positional[0]) {
                console.error("Usage: csa-header protocol <text-file>");
                process.exit(1);
            }
            dumpProtocol(positional[0]);
            break;

        case "help":
        case "--help":
        case "-h":
            printHelp();
            break;

        default:
            console.error(`Unknown command: ${command}`);
            printHelp();
            process.exit(1);
    }
}

function printHelp() {
    console.log(`
csa-header CLI

Commands:
  dump <dicom-file> [--series] [--json]    Print the CSA image (or series) header of a DICOM file.
                                           XA Enhanced files print their XProtocol instead.
  raw <csa-file> [--binary-numbers] [--json]
                                           Print a CSA header saved as a raw byte dump.
  protocol <text-file>                     Print an ASCCONV / XProtocol text file as JSON.
    `);
}

function dumpDicom(filePath: string, kind: CsaHeaderKind, asJson: boolean) {
    try {
        const buffer = fs.readFileSync(filePath);
        const result = readCsaFromDicom(new Uint8Array(buffer), { kind });

        if (!result) {
            console.error(`No CSA ${kind} header or XProtocol found in ${filePath}`);
            process.exit(1);
        }
        if (result.source === "xprotocol") {
            printProtocol(filePath, result.protocol);
            return;
        }
        printHeader(filePath, result.header, asJson);
    } catch (e) {
        console.error(`Error parsing file: ${describeError(e)}`);
        process.exit(1);
    }
}

function dumpRaw(filePath: string, numericEncoding: NumericEncoding, asJson: boolean) {
    try {
        const buffer = fs.readFileSync(filePath);
        const header = parseCsaHeader(new Uint8Array(buffer), { numericEncoding });
        printHeader(filePath, header, asJson);
    } catch (e) {
        console.error(`Error parsing file: ${describeError(e)}`);
        process.exit(1);
    }
}

function dumpProtocol(filePath: string) {
    try {
        const text = decodeLatin1(new Uint8Array(fs.readFileSync(filePath)));
        const { protocol, attributes } = parseProtocolDetailed(text);
        if (Object.keys(attributes).length > 0) {
            console.log(`ASCCONV attributes: ${JSON.stringify(attributes)}`);
        }
        printProtocol(filePath, protocol);
    } catch (e) {
        console.error(`Error parsing file: ${describeError(e)}`);
        process.exit(1);
    }
}

function printHeader(filePath: string, header: ParsedHeader, asJson: boolean) {
    if (asJson) {
        console.log(JSON.stringify(headerToObject(header), jsonReplacer, 2));
        return;
    }

    console.log(`\nParsed ${filePath}:`);
    console.log(`Total Tags: ${header.size}`);
    console.log("-".repeat(50));
    for (const line of formatHeaderLines(header)) {
        console.log(line);
    }
    console.log("-".repeat(50));
}

function printProtocol(filePath: string, protocol: ProtocolBlock) {
    const slices = getSliceCount(protocol);
    console.log(`\nProtocol from ${filePath}${slices !== undefined ? ` (${slices} slices)` : ""}:`);
    console.log(JSON.stringify(protocol, null, 2));
}

function jsonReplacer(_key: string, value: unknown): unknown {
    return value instanceof Uint8Array ? `[Binary Data: ${value.length} bytes]` : value;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export { run };

// Run if main
if (require.main === module) {
    run().catch((err) => {
        console.error(err);
        process.exit(1);
    });
}
