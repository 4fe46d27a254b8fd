/**
 * Type declarations for the 7zip-min module
 */
declare module '7zip-min' {
    /**
     * Unpack (extract) an archive of any format 7-Zip understands
     * @param source - Path to the archive
     * @param destination - Directory where contents will be extracted
     */
    export function unpack(
        source: string,
        destination: string,
        callback: (error?: Error | null) => void
    ): void;
}
