/**
 * IScreen - Port for the terminal's screen.
 */
export interface IScreen {
    clear(): void;
}
