/**
 * Tests for the LaTeX resume parser and editor
 */

import { describe, it, expect } from 'vitest';
import { cleanLatex, maskComments, parseResume } from '../../optimizer/parser/resumeParser';
import { SAMPLE_RESUME } from '../helpers/fixtures';

const TEMPLATE_RESUME = String.raw`\documentclass{article}
\newcommand{\resumeItem}[1]{\item\small{#1}}
\begin{document}
\section{Experience}
\resumeSubheading{Globex}{2020 -- 2023}
\resumeItemListStart
  \resumeItem{Cut API latency by 40\% using Redis \& caching}
  % \resumeItem{Commented out bullet that must be ignored}
\resumeItemListEnd
\end{document}
`;

const PLAIN_RESUME = `Quick summary line
- Led migration of billing to event sourcing
\\section{Skills}
- Languages: Go, Rust, TypeScript
\\begin{itemize}
- dash line inside a list environment
\\end{itemize}
`;

describe('maskComments', () => {
  it('should blank comments but keep escaped percent signs and offsets', () => {
    const content = String.raw`50\% off % sale ends soon` + '\nnext line';
    const masked = maskComments(content);

    expect(masked).toBe(String.raw`50\% off ` + ' '.repeat(16) + '\nnext line');
    expect(masked).toHaveLength(content.length);
  });
});

describe('cleanLatex', () => {
  it('should keep arguments and unescape specials', () => {
    expect(cleanLatex(String.raw`Reduced cost by 30\% with \href{https://example.com}{Terraform}~modules\\`))
      .toBe('Reduced cost by 30% with Terraform modules');
  });

  it('should drop formatting commands and fix spacing before punctuation', () => {
    expect(cleanLatex(String.raw`Shipped \textbf{v2} , \emph{on time}\vspace{2pt}`)).toBe('Shipped v2, on time');
  });
});

describe('parseResume', () => {
  it('should find \\item bullets with their section and subsection', () => {
    const document = parseResume(SAMPLE_RESUME, 'main.tex');

    expect(document.fileName).toBe('main.tex');
    expect(document.bullets.map(bullet => [bullet.id, bullet.text, bullet.section, bullet.subsection])).toEqual([
      ['b1', 'Built data pipelines in Python processing 2TB daily', 'Experience', 'Acme Corp'],
      ['b2', 'Organized the team offsite', 'Experience', 'Acme Corp'],
      ['b3', 'Wrote a Rust key-value store', 'Projects', undefined]
    ]);
    expect(document.getBullet('b3')?.rawText).toBe(String.raw`Wrote a \textbf{Rust} key-value store`);
  });

  it('should keep spans that point at the raw text', () => {
    const document = parseResume(SAMPLE_RESUME);
    for (const bullet of document.bullets) {
      expect(SAMPLE_RESUME.slice(bullet.span.start, bullet.span.end)).toBe(bullet.rawText);
    }
  });

  it('should read \\resumeItem bullets and ignore the preamble and comments', () => {
    const document = parseResume(TEMPLATE_RESUME);

    expect(document.bullets).toEqual([
      expect.objectContaining({
        id: 'b1',
        text: 'Cut API latency by 40% using Redis & caching',
        rawText: String.raw`Cut API latency by 40\% using Redis \& caching`,
        section: 'Experience',
        subsection: 'Globex',
        style: 'resumeItem'
      })
    ]);
  });

  it('should read dash lines outside list environments', () => {
    const document = parseResume(PLAIN_RESUME);

    expect(document.bullets.map(bullet => [bullet.text, bullet.section, bullet.style])).toEqual([
      ['Led migration of billing to event sourcing', 'General', 'dash'],
      ['Languages: Go, Rust, TypeScript', 'Skills', 'dash']
    ]);
  });

  it('should skip very short bullets and number the rest consecutively', () => {
    const content = String.raw`\begin{document}
\section{Skills}
\begin{itemize}
  \item Python
  \item[--] Designed a plugin system for the build tool
\end{itemize}
\end{document}`;

    const bullets = parseResume(content).bullets;
    expect(bullets.map(bullet => [bullet.id, bullet.text])).toEqual([
      ['b1', 'Designed a plugin system for the build tool']
    ]);
  });

  it('should return no bullets for a document without any', () => {
    expect(parseResume('\\documentclass{article}\n\\begin{document}\nHello\n\\end{document}').bullets).toEqual([]);
  });
});

describe('ResumeDocument', () => {
  it('should apply replacements, insertions and comments', () => {
    const document = parseResume(SAMPLE_RESUME);
    document.replaceBullet('b1', 'Built streaming pipelines in Python');
    document.insertAfter('b1', 'Added a new bullet');
    document.commentOut('b2');

    const expected = SAMPLE_RESUME
      .replace(
        '  \\item Built data pipelines in Python processing 2TB daily',
        '  \\item Built streaming pipelines in Python\n  \\item Added a new bullet'
      )
      .replace('  \\item Organized the team offsite', '  % \\item Organized the team offsite');

    expect(document.render()).toBe(expected);
    expect(document.editCount).toBe(3);
    expect(document.content).toBe(SAMPLE_RESUME);
  });

  it('should insert in the style of the anchor bullet', () => {
    const document = parseResume(TEMPLATE_RESUME);
    document.insertAfter('b1', String.raw`Added 10\% more tests`);

    expect(document.render()).toContain(
      String.raw`\resumeItem{Cut API latency by 40\% using Redis \& caching}` + '\n  ' + String.raw`\resumeItem{Added 10\% more tests}`
    );
  });

  it('should keep insertion order for several additions after one bullet', () => {
    const document = parseResume(PLAIN_RESUME);
    document.insertAfter('b2', 'First addition');
    document.insertAfter('b2', 'Second addition');

    expect(document.render()).toContain('- Languages: Go, Rust, TypeScript\n- First addition\n- Second addition\n');
  });

  it('should refuse to edit a bullet twice', () => {
    const document = parseResume(SAMPLE_RESUME);
    document.replaceBullet('b1', 'Once');

    expect(() => document.commentOut('b1')).toThrow('Bullet b1 has already been edited');
    expect(() => document.replaceBullet('b9', 'x')).toThrow('Unknown bullet id: b9');
  });
});
