export interface SplashControl {
  preserve(): void;
  release(): void;
}

/**
 * Splash overlay rendered statically in index.html, so it is on screen
 * before any script runs. `release` removes it from the document.
 */
export class DomSplashScreen implements SplashControl {
  constructor(
    private readonly doc: Document,
    private readonly elementId: string = 'splash'
  ) {}

  preserve(): void {
    const element = this.doc.getElementById(this.elementId);
    if (element) {
      element.hidden = false;
      element.setAttribute('aria-busy', 'true');
    }
  }

  release(): void {
    this.doc.getElementById(this.elementId)?.remove();
  }
}
