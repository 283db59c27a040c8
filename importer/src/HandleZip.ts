import JSZip from "jszip";
import type { IuploadfileList } from "./ICommon.js";

/**
 * Archive members read as text; media and binary parts are skipped
 */
const TEXT_EXTENSIONS = new Set(['xml', 'rels']);

/**
 * HandleZip class for extracting XLSX files
 * XLSX files are ZIP archives containing XML files and media
 */
export class HandleZip {
    readonly data: Uint8Array;
    readonly fileName: string;

    constructor(data: Uint8Array, fileName: string) {
        this.data = data;
        this.fileName = fileName;
    }

    /**
     * Unzip the XLSX file and return its XML parts
     * @throws Error if the file cannot be unzipped or is not a valid XLSX
     */
    async unzipFile(): Promise<IuploadfileList> {
        let zip: JSZip;

        try {
            zip = await JSZip.loadAsync(this.data);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to unzip file "${this.fileName}": ${message}`);
        }

        const fileList: IuploadfileList = {};

        for (const zipEntry of Object.values(zip.files)) {
            // Skip directories
            if (zipEntry.dir) {
                continue;
            }

            const fileNameArr = zipEntry.name.split(".");
            const suffix = fileNameArr[fileNameArr.length - 1].toLowerCase();
            if (!TEXT_EXTENSIONS.has(suffix)) {
                continue;
            }

            try {
                fileList[zipEntry.name] = await zipEntry.async("string");
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                throw new Error(`Failed to extract file "${zipEntry.name}": ${message}`);
            }
        }

        // Validate that this looks like an XLSX file
        if (!this.validateXlsxStructure(fileList)) {
            throw new Error(`File "${this.fileName}" does not appear to be a valid XLSX file`);
        }

        return fileList;
    }

    /**
     * Basic validation that the extracted files look like an XLSX structure
     */
    private validateXlsxStructure(fileList: IuploadfileList): boolean {
        const requiredFiles = [
            '[Content_Types].xml',
            'xl/workbook.xml'
        ];

        for (const required of requiredFiles) {
            const hasFile = Object.keys(fileList).some(
                path => path.toLowerCase() === required.toLowerCase()
            );
            if (!hasFile) {
                return false;
            }
        }

        return true;
    }
}
