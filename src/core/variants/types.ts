/**
 * One build context of an image family, e.g. `docker/php/alpine-3`
 */
export interface Variant {
    /** Directory name, e.g. "alpine-3" */
    name: string;
    /** Owning image family directory */
    familyPath: string;
    /** Absolute path of the build context */
    path: string;
    /** Whether the directory holds a Dockerfile */
    hasDefinition: boolean;
}

/** Build-definition file every variant is expected to carry */
export const DEFINITION_FILE = 'Dockerfile';
