export interface Violation {
    file: string;
    line: number;
    message: string;
}
