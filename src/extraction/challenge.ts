/** True when the page source carries any of the anti-bot challenge markers. */
export function detectChallenge(html: string, markers: readonly string[]): boolean {
    const source = html.toLowerCase();
    return markers.some((marker) => source.includes(marker.toLowerCase()));
}
