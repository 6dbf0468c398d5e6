import * as fs from 'node:fs';

/**
 * Options for the storage utility.
 */
export interface StorageOptions {
    /** Receives a line for every file system operation */
    log: (message: string) => void;
}

/**
 * Promise-based wrapper over the file system calls the file store needs.
 */
export interface Storage {
    exists: (path: string) => Promise<boolean>;
    isFileReadable: (path: string) => Promise<boolean>;
    createDirectory: (path: string) => Promise<void>;
    readFile: (path: string, encoding: BufferEncoding) => Promise<string>;
    writeFile: (path: string, data: string, encoding: BufferEncoding) => Promise<void>;
    rename: (from: string, to: string) => Promise<void>;
    deleteFile: (path: string) => Promise<void>;
}

export const create = (params: StorageOptions): Storage => {
    const log = params.log;

    const exists = async (path: string): Promise<boolean> => {
        try {
            await fs.promises.stat(path);
            return true;
        } catch (error: unknown) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return false;
            }
            throw error;
        }
    }

    const isFileReadable = async (path: string): Promise<boolean> => {
        try {
            const stats = await fs.promises.stat(path);
            if (!stats.isFile()) {
                log(`${path} is not a file`);
                return false;
            }
            await fs.promises.access(path, fs.constants.R_OK);
            return true;
        } catch (error: unknown) {
            log(`${path} is not readable: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        }
    }

    const createDirectory = async (path: string): Promise<void> => {
        log(`Creating directory ${path}`);
        await fs.promises.mkdir(path, { recursive: true });
    }

    const readFile = async (path: string, encoding: BufferEncoding): Promise<string> => {
        log(`Reading ${path}`);
        return fs.promises.readFile(path, { encoding });
    }

    const writeFile = async (path: string, data: string, encoding: BufferEncoding): Promise<void> => {
        log(`Writing ${path}`);
        await fs.promises.writeFile(path, data, { encoding });
    }

    const rename = async (from: string, to: string): Promise<void> => {
        log(`Renaming ${from} to ${to}`);
        await fs.promises.rename(from, to);
    }

    const deleteFile = async (path: string): Promise<void> => {
        log(`Deleting ${path}`);
        await fs.promises.rm(path, { force: true });
    }

    return {
        exists,
        isFileReadable,
        createDirectory,
        readFile,
        writeFile,
        rename,
        deleteFile,
    };
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException => {
    return error instanceof Error && 'code' in error;
}
